import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  type CallToolResult,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { loadConfig, type ServerConfig } from "./config/config.js";
import { createLogger, LogLevel, logger } from "./services/Logger.js";
import type { Mailbox } from "./services/Mailbox.js";
import { openMailbox } from "./services/MailboxFactory.js";
import {
  createMailboxTools,
  handleMailboxTool,
  isMailboxTool,
} from "./tools/mailboxTools.js";
import type { MessageView } from "./types/mailbox.types.js";
import { toMailboxStoreError, ValidationError } from "./types/errors.js";

const SERVER_VERSION = "0.1.0";

export class MailboxMcpServer {
  private server: Server;
  private mailbox?: Promise<Mailbox<MessageView>>;
  // Tail of the call chain; a mailbox serves one request at a time
  private pending: Promise<unknown> = Promise.resolve();
  private logger = createLogger("MailboxMcpServer");

  private constructor(
    private readonly config: ServerConfig,
    private readonly connect: (config: ServerConfig) => Promise<Mailbox<MessageView>>,
  ) {
    this.server = new Server(
      {
        name: "uid-mailbox-server",
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          logging: {},
        },
      },
    );
  }

  /**
   * Construction is separate from connecting; the IMAP session is opened on
   * first tool use.
   */
  static create(
    config: ServerConfig = loadConfig(),
    connect: (config: ServerConfig) => Promise<Mailbox<MessageView>> = openMailbox,
  ): MailboxMcpServer {
    const instance = new MailboxMcpServer(config, connect);

    // Configure logger with MCP server
    logger.setMcpServer(instance.server);
    if (config.debug) {
      logger.setMinLevel(LogLevel.DEBUG);
      instance.logger.debug("Debug mode enabled");
    }

    instance.setupErrorHandling();
    instance.setupToolHandlers();
    return instance;
  }

  private setupErrorHandling(): void {
    this.server.onerror = (error) => {
      this.logger.error(
        "MCP Server error",
        {
          operation: "mcp_server_error",
          service: "server",
        },
        { error: error.message, stack: error.stack },
      );
    };
  }

  /**
   * Shut down on SIGINT/SIGTERM. Only the entry point installs these.
   */
  installSignalHandlers(): void {
    const handleShutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, shutting down gracefully`, {
        operation: "shutdown",
        service: "process",
      });
      await this.cleanup();
      process.exit(0);
    };

    process.on("SIGINT", () => void handleShutdown("SIGINT"));
    process.on("SIGTERM", () => void handleShutdown("SIGTERM"));
  }

  private getMailbox(): Promise<Mailbox<MessageView>> {
    if (!this.mailbox) {
      this.mailbox = this.connect(this.config).then(
        (mailbox) => {
          this.logger.info(
            "Mailbox opened",
            {
              operation: "getMailbox",
              service: "MailboxMcpServer",
              folder: mailbox.folder,
            },
            { host: this.config.imap.host },
          );
          return mailbox;
        },
        (error: unknown) => {
          this.mailbox = undefined;
          throw error;
        },
      );
    }
    return this.mailbox;
  }

  /**
   * Run `task` after every call queued before it has settled.
   */
  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.pending.then(task);
    this.pending = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Run one tool call. Calls are serialized: the MCP transport dispatches
   * requests concurrently, but the mailbox and its session take one request
   * at a time. Exposed for the request handler and for tests.
   */
  callTool(name: string, args: unknown): Promise<CallToolResult> {
    return this.enqueue(() => this.executeTool(name, args));
  }

  private async executeTool(name: string, args: unknown): Promise<CallToolResult> {
    const timer = this.logger.startTimer(`tool:${name}`);

    this.logger.debug(
      `Executing tool: ${name}`,
      {
        operation: "callTool",
        service: "toolHandler",
      },
      { tool: name },
    );

    try {
      if (!isMailboxTool(name)) {
        throw new ValidationError(`Unknown tool: ${name}`, "tool_name", name);
      }

      const mailbox = await this.getMailbox();
      const result = await handleMailboxTool(name, args, mailbox);

      const metrics = timer.end(!result.isError);
      this.logger.info(
        `Tool executed: ${name}`,
        {
          operation: "callTool",
          service: "toolHandler",
          duration: metrics.duration,
        },
        { tool: name, success: !result.isError },
      );

      return result;
    } catch (error) {
      const errorType =
        error instanceof Error ? error.constructor.name : "UnknownError";
      const metrics = timer.end(false, errorType);

      const mailboxError = toMailboxStoreError(
        error instanceof Error ? error : new Error(String(error)),
        {
          operation: `call_tool:${name}`,
          service: "MailboxMcpServer",
          details: { tool: name },
        },
      );

      this.logger.error(
        `Tool execution failed: ${name}`,
        {
          operation: "callTool",
          service: "toolHandler",
          duration: metrics.duration,
        },
        {
          tool: name,
          error: mailboxError.toJSON(),
          userMessage: mailboxError.getUserMessage(),
          isRetryable: mailboxError.isRetryable,
        },
      );

      return {
        content: [
          {
            type: "text",
            text: `Error executing ${name}: ${mailboxError.getUserMessage()}${mailboxError.isRetryable ? " (This operation can be retried)" : ""}`,
          },
        ],
        isError: true,
      };
    }
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, () => ({
      tools: createMailboxTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  async start(): Promise<void> {
    const startTimer = this.logger.startTimer("server_startup");

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    const metrics = startTimer.end(true);
    this.logger.info(
      "Mailbox MCP Server started successfully",
      {
        operation: "server_startup",
        service: "MailboxMcpServer",
        duration: metrics.duration,
      },
      {
        version: SERVER_VERSION,
        capabilities: ["tools", "logging"],
        transport: "stdio",
        folder: this.config.mailbox.folder,
      },
    );
  }

  async cleanup(): Promise<void> {
    const cleanupTimer = this.logger.startTimer("server_cleanup");

    try {
      const performanceMetrics = logger.getPerformanceMetrics();
      this.logger.info(
        "Starting server cleanup",
        {
          operation: "cleanup",
          service: "MailboxMcpServer",
        },
        {
          performance: {
            totalOperations: performanceMetrics.total,
            successful: performanceMetrics.successful,
            failed: performanceMetrics.failed,
            averageDuration: performanceMetrics.averageDuration,
          },
        },
      );

      await this.enqueue(async () => {
        const opened = this.mailbox;
        this.mailbox = undefined;
        if (opened) {
          await (await opened).close();
        }
      });

      const metrics = cleanupTimer.end(true);
      this.logger.info("Server cleanup completed successfully", {
        operation: "cleanup",
        service: "MailboxMcpServer",
        duration: metrics.duration,
      });
    } catch (error) {
      const metrics = cleanupTimer.end(
        false,
        error instanceof Error ? error.constructor.name : "UnknownError",
      );
      this.logger.error(
        "Error during cleanup",
        {
          operation: "cleanup",
          service: "MailboxMcpServer",
          duration: metrics.duration,
        },
        { error: error instanceof Error ? error.message : String(error) },
      );
    }
  }
}

async function main(): Promise<void> {
  let config: ServerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const configError = toMailboxStoreError(
      error instanceof Error ? error : new Error(String(error)),
      { operation: "loadConfiguration", service: "config" },
    );
    logger.critical(
      "Failed to load configuration",
      { operation: "loadConfiguration", service: "config" },
      { error: configError.message },
    );
    process.exit(1);
  }

  const server = MailboxMcpServer.create(config);
  server.installSignalHandlers();
  await server.start();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    const mailboxError = toMailboxStoreError(
      error instanceof Error ? error : new Error(String(error)),
      {
        operation: "main",
        service: "MailboxMcpServer",
      },
    );

    console.error("Fatal error:", {
      error: mailboxError.toJSON(),
      userMessage: mailboxError.getUserMessage(),
    });
    process.exit(1);
  });
}
