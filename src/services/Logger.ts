/**
 * Structured logging for the mailbox layer.
 * Writes to stderr and, once an MCP server is attached, forwards entries as
 * MCP logging notifications. Levels follow RFC 5424.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { LoggingLevel } from "@modelcontextprotocol/sdk/types.js";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  NOTICE = "notice",
  WARNING = "warning",
  ERROR = "error",
  CRITICAL = "critical",
  ALERT = "alert",
  EMERGENCY = "emergency",
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.NOTICE]: 2,
  [LogLevel.WARNING]: 3,
  [LogLevel.ERROR]: 4,
  [LogLevel.CRITICAL]: 5,
  [LogLevel.ALERT]: 6,
  [LogLevel.EMERGENCY]: 7,
};

const MCP_LEVELS: Record<LogLevel, LoggingLevel> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.NOTICE]: "notice",
  [LogLevel.WARNING]: "warning",
  [LogLevel.ERROR]: "error",
  [LogLevel.CRITICAL]: "critical",
  [LogLevel.ALERT]: "alert",
  [LogLevel.EMERGENCY]: "emergency",
};

export interface LogContext {
  operation?: string;
  service?: string;
  folder?: string;
  uid?: number;
  duration?: number;
  metadata?: Record<string, unknown>;
}

export interface PerformanceMetrics {
  operation: string;
  duration: number;
  startTime: Date;
  endTime: Date;
  success: boolean;
  errorType?: string;
  metadata?: Record<string, unknown>;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  context: LogContext;
  timestamp: Date;
  data?: Record<string, unknown>;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableStderr: boolean;
  enableMcpNotifications: boolean;
  includeTimestamp: boolean;
  includeContext: boolean;
  maxContextDepth: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  enableStderr: true,
  enableMcpNotifications: true,
  includeTimestamp: true,
  includeContext: true,
  maxContextDepth: 3,
};

type LogData = Record<string, unknown>;

export class Logger {
  private config: LoggerConfig;
  private mcpServer?: Server;
  private performanceMetrics: PerformanceMetrics[] = [];
  private readonly maxMetricsHistory = 1000;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  setMcpServer(server: Server): void {
    this.mcpServer = server;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.minLevel];
  }

  /**
   * `[time] [LEVEL] [logger] message {op=…, svc=…, folder=…, uid=…, dur=…ms} data={…}`
   */
  formatEntry(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);

    if (entry.logger) {
      parts.push(`[${entry.logger}]`);
    }

    parts.push(entry.message);

    if (this.config.includeContext) {
      const contextParts: string[] = [];
      const { operation, service, folder, uid, duration } = entry.context;

      if (operation) contextParts.push(`op=${operation}`);
      if (service) contextParts.push(`svc=${service}`);
      if (folder) contextParts.push(`folder=${folder}`);
      if (uid !== undefined) contextParts.push(`uid=${uid}`);
      if (duration !== undefined) contextParts.push(`dur=${duration}ms`);

      if (contextParts.length > 0) {
        parts.push(`{${contextParts.join(", ")}}`);
      }
    }

    if (entry.data) {
      parts.push(`data=${this.serializeData(entry.data)}`);
    }

    return parts.join(" ");
  }

  private serializeData(data: unknown, depth = 0): string {
    if (depth >= this.config.maxContextDepth) {
      return "[max depth reached]";
    }

    if (data === null || data === undefined) {
      return String(data);
    }

    if (data instanceof Error) {
      return `Error: ${data.message}`;
    }

    if (data instanceof Date) {
      return data.toISOString();
    }

    if (Buffer.isBuffer(data)) {
      return `[Buffer(${data.length})]`;
    }

    if (data instanceof Set) {
      return this.serializeData(Array.from(data), depth);
    }

    if (Array.isArray(data)) {
      if (data.length === 0) return "[]";
      if (data.length > 5) return `[Array(${data.length})]`;
      return `[${data.map((item) => this.serializeData(item, depth + 1)).join(", ")}]`;
    }

    if (typeof data === "object") {
      const entries = Object.entries(data);
      if (entries.length === 0) return "{}";
      if (entries.length > 10) return `{Object(${entries.length} keys)}`;

      return `{${entries
        .map(([key, value]) => `${key}: ${this.serializeData(value, depth + 1)}`)
        .join(", ")}}`;
    }

    return String(data);
  }

  private async sendMcpNotification(entry: LogEntry): Promise<void> {
    if (!this.config.enableMcpNotifications || !this.mcpServer) return;

    try {
      await this.mcpServer.sendLoggingMessage({
        level: MCP_LEVELS[entry.level],
        logger: entry.logger,
        data: {
          message: entry.message,
          timestamp: entry.timestamp.toISOString(),
          ...entry.context,
          ...(entry.data ? { data: entry.data } : {}),
        },
      });
    } catch (error) {
      // Fall back to stderr if MCP notification fails
      console.error(
        `[LOGGER] Failed to send MCP notification: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  log(
    level: LogLevel,
    message: string,
    context: LogContext = {},
    loggerName?: string,
    data?: LogData,
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      logger: loggerName,
      context,
      timestamp: new Date(),
      data,
    };

    if (this.config.enableStderr) {
      console.error(this.formatEntry(entry));
    }

    // Not awaited; failures are reported inside sendMcpNotification
    void this.sendMcpNotification(entry);
  }

  debug(message: string, context?: LogContext, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, context, undefined, data);
  }

  info(message: string, context?: LogContext, data?: LogData): void {
    this.log(LogLevel.INFO, message, context, undefined, data);
  }

  warning(message: string, context?: LogContext, data?: LogData): void {
    this.log(LogLevel.WARNING, message, context, undefined, data);
  }

  error(message: string, context?: LogContext, data?: LogData): void {
    this.log(LogLevel.ERROR, message, context, undefined, data);
  }

  critical(message: string, context?: LogContext, data?: LogData): void {
    this.log(LogLevel.CRITICAL, message, context, undefined, data);
  }

  recordPerformance(metrics: PerformanceMetrics): void {
    this.performanceMetrics.push(metrics);

    if (this.performanceMetrics.length > this.maxMetricsHistory) {
      this.performanceMetrics = this.performanceMetrics.slice(
        -this.maxMetricsHistory,
      );
    }

    this.log(
      metrics.success ? LogLevel.DEBUG : LogLevel.WARNING,
      `Performance: ${metrics.operation} ${metrics.success ? "completed" : "failed"} in ${metrics.duration}ms`,
      {
        operation: metrics.operation,
        duration: metrics.duration,
        metadata: metrics.metadata,
      },
      "performance",
      metrics.errorType ? { errorType: metrics.errorType } : undefined,
    );
  }

  getPerformanceMetrics(): {
    total: number;
    successful: number;
    failed: number;
    averageDuration: number;
  } {
    const total = this.performanceMetrics.length;
    const successful = this.performanceMetrics.filter((m) => m.success).length;
    const averageDuration =
      total > 0
        ? this.performanceMetrics.reduce((sum, m) => sum + m.duration, 0) /
          total
        : 0;

    return {
      total,
      successful,
      failed: total - successful,
      averageDuration: Math.round(averageDuration * 100) / 100,
    };
  }

  child(loggerName: string): ChildLogger {
    return new ChildLogger(this, loggerName);
  }

  startTimer(operation: string, metadata?: LogData): PerformanceTimer {
    return new PerformanceTimer(this, operation, metadata);
  }
}

/**
 * Logger bound to a component name
 */
export class ChildLogger {
  constructor(
    private parent: Logger,
    private loggerName: string,
  ) {}

  debug(message: string, context?: LogContext, data?: LogData): void {
    this.parent.log(LogLevel.DEBUG, message, context, this.loggerName, data);
  }

  info(message: string, context?: LogContext, data?: LogData): void {
    this.parent.log(LogLevel.INFO, message, context, this.loggerName, data);
  }

  warning(message: string, context?: LogContext, data?: LogData): void {
    this.parent.log(LogLevel.WARNING, message, context, this.loggerName, data);
  }

  error(message: string, context?: LogContext, data?: LogData): void {
    this.parent.log(LogLevel.ERROR, message, context, this.loggerName, data);
  }

  critical(message: string, context?: LogContext, data?: LogData): void {
    this.parent.log(LogLevel.CRITICAL, message, context, this.loggerName, data);
  }

  startTimer(operation: string, metadata?: LogData): PerformanceTimer {
    return this.parent.startTimer(operation, metadata);
  }
}

export class PerformanceTimer {
  private startTime: Date;

  constructor(
    private logger: Logger,
    private operation: string,
    private metadata?: LogData,
  ) {
    this.startTime = new Date();
  }

  end(success = true, errorType?: string): PerformanceMetrics {
    const endTime = new Date();

    const metrics: PerformanceMetrics = {
      operation: this.operation,
      duration: endTime.getTime() - this.startTime.getTime(),
      startTime: this.startTime,
      endTime,
      success,
      errorType,
      metadata: this.metadata,
    };

    this.logger.recordPerformance(metrics);
    return metrics;
  }
}

export const logger = new Logger();

export function createLogger(loggerName: string): ChildLogger {
  return logger.child(loggerName);
}
