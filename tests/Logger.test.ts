import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";
import {
  ChildLogger,
  createLogger,
  LogLevel,
  Logger,
  type LoggerConfig,
  PerformanceTimer,
} from "../src/services/Logger.js";

function createMcpServer(): Server {
  return new Server(
    { name: "logger-test", version: "0.0.0" },
    { capabilities: { logging: {} } },
  );
}

describe("Logger", () => {
  let logger: Logger;
  let mockConsoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    logger = new Logger({ includeTimestamp: false });
  });

  afterEach(() => {
    mockConsoleError.mockRestore();
  });

  describe("MCP Compliance", () => {
    it("should write to stderr using console.error", () => {
      logger.info("Test message");
      expect(mockConsoleError).toHaveBeenCalledWith("[INFO] Test message");
    });

    it("should send MCP notifications when server is set", async () => {
      const server = createMcpServer();
      const send = vi.spyOn(server, "sendLoggingMessage").mockResolvedValue(undefined);
      logger.setMcpServer(server);

      logger.child("Mailbox").warning(
        "Test notification",
        { operation: "test", folder: "INBOX" },
        { foo: "bar" },
      );
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(send).toHaveBeenCalledWith({
        level: "warning",
        logger: "Mailbox",
        data: expect.objectContaining({
          message: "Test notification",
          operation: "test",
          folder: "INBOX",
          data: { foo: "bar" },
        }),
      });
    });

    it("should fall back to stderr when a notification fails", async () => {
      const server = createMcpServer();
      vi.spyOn(server, "sendLoggingMessage").mockRejectedValue(
        new Error("MCP error"),
      );
      logger.setMcpServer(server);

      logger.error("Test error message");
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(mockConsoleError).toHaveBeenCalledWith(
        "[LOGGER] Failed to send MCP notification: MCP error",
      );
    });

    it("should not notify when disabled", async () => {
      const server = createMcpServer();
      const send = vi.spyOn(server, "sendLoggingMessage").mockResolvedValue(undefined);
      logger = new Logger({ enableMcpNotifications: false });
      logger.setMcpServer(server);

      logger.info("no MCP");
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("Log Levels (RFC 5424)", () => {
    it("should label every level", () => {
      logger.setMinLevel(LogLevel.DEBUG);

      for (const level of Object.values(LogLevel)) {
        logger.log(level, `${level} message`);
      }

      const outputs = mockConsoleError.mock.calls.map((call) => call[0]);
      expect(outputs).toEqual([
        "[DEBUG] debug message",
        "[INFO] info message",
        "[NOTICE] notice message",
        "[WARNING] warning message",
        "[ERROR] error message",
        "[CRITICAL] critical message",
        "[ALERT] alert message",
        "[EMERGENCY] emergency message",
      ]);
    });

    it("should respect minimum log level", () => {
      logger.setMinLevel(LogLevel.WARNING);

      logger.debug("debug - should not log");
      logger.info("info - should not log");
      logger.warning("warning - should log");
      logger.error("error - should log");

      expect(mockConsoleError).toHaveBeenCalledTimes(2);
      expect(logger.getMinLevel()).toBe(LogLevel.WARNING);
    });
  });

  describe("Structured Logging", () => {
    it("should include context in log output", () => {
      logger.info("Fetched", {
        operation: "fetchRaw",
        service: "MessageCache",
        folder: "INBOX",
        uid: 5,
        duration: 150,
      });

      expect(mockConsoleError).toHaveBeenCalledWith(
        "[INFO] Fetched {op=fetchRaw, svc=MessageCache, folder=INBOX, uid=5, dur=150ms}",
      );
    });

    it("should include timestamp when configured", () => {
      logger = new Logger({ includeTimestamp: true });
      logger.info("Test with timestamp");

      expect(mockConsoleError.mock.calls[0][0]).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] Test with timestamp$/,
      );
    });

    it("should serialize message data", () => {
      logger.info(
        "Appended",
        {},
        {
          flags: new Set(["\\Seen"]),
          source: Buffer.from("abc"),
          date: new Date("2024-01-01T00:00:00Z"),
          error: new Error("test error"),
          count: 2,
        },
      );

      expect(mockConsoleError).toHaveBeenCalledWith(
        "[INFO] Appended data={flags: [\\Seen], source: [Buffer(3)], date: 2024-01-01T00:00:00.000Z, error: Error: test error, count: 2}",
      );
    });

    it("should stop at the maximum depth", () => {
      logger.info(
        "Deep object",
        {},
        { data: { level1: { level2: { level3: "too deep" } } } },
      );

      expect(mockConsoleError).toHaveBeenCalledWith(
        "[INFO] Deep object data={data: {level1: {level2: [max depth reached]}}}",
      );
    });

    it("should abbreviate large arrays and objects", () => {
      const manyKeys: Record<string, number> = {};
      for (let i = 0; i < 20; i++) {
        manyKeys[`key${i}`] = i;
      }

      logger.info("Large", {}, { uids: new Array(100).fill(1), obj: manyKeys });

      expect(mockConsoleError).toHaveBeenCalledWith(
        "[INFO] Large data={uids: [Array(100)], obj: {Object(20 keys)}}",
      );
    });

    it("should render nullish values", () => {
      logger.info("Nullish", {}, { a: undefined, b: null, c: 0, d: false });

      expect(mockConsoleError).toHaveBeenCalledWith(
        "[INFO] Nullish data={a: undefined, b: null, c: 0, d: false}",
      );
    });
  });

  describe("Child Logger", () => {
    it("should prefix the logger name", () => {
      const child = logger.child("ChildService");
      expect(child).toBeInstanceOf(ChildLogger);

      child.info("Child message");
      expect(mockConsoleError).toHaveBeenCalledWith(
        "[INFO] [ChildService] Child message",
      );
    });

    it("should inherit parent configuration", () => {
      logger.setMinLevel(LogLevel.ERROR);
      const child = logger.child("ChildLogger");

      child.info("should not log");
      child.critical("should log");

      expect(mockConsoleError).toHaveBeenCalledTimes(1);
      expect(mockConsoleError.mock.calls[0][0]).toBe(
        "[CRITICAL] [ChildLogger] should log",
      );
    });

    it("should create named loggers on the shared instance", () => {
      createLogger("Shared").error("from shared");
      expect(mockConsoleError.mock.calls[0][0]).toContain(
        "[ERROR] [Shared] from shared",
      );
    });
  });

  describe("Performance Monitoring", () => {
    it("should track performance metrics with timer", () => {
      const timer = logger.startTimer("test_operation", { folder: "INBOX" });
      const metrics = timer.end(true);

      expect(metrics.operation).toBe("test_operation");
      expect(metrics.success).toBe(true);
      expect(metrics.duration).toBeGreaterThanOrEqual(0);
      expect(metrics.endTime.getTime()).toBeGreaterThanOrEqual(
        metrics.startTime.getTime(),
      );
      expect(metrics.metadata).toEqual({ folder: "INBOX" });
    });

    it("should log failures as warnings", () => {
      const metrics = logger.startTimer("failing_op").end(false, "TestError");

      expect(metrics.errorType).toBe("TestError");
      const output = mockConsoleError.mock.calls[0][0];
      expect(output).toMatch(
        /^\[WARNING\] \[performance\] Performance: failing_op failed in \d+ms \{op=failing_op, dur=\d+ms\} data=\{errorType: TestError\}$/,
      );
    });

    it("should log successes at debug level", () => {
      logger.startTimer("quiet_op").end(true);
      expect(mockConsoleError).not.toHaveBeenCalled();

      logger.setMinLevel(LogLevel.DEBUG);
      logger.startTimer("logged_op").end(true);
      expect(mockConsoleError.mock.calls[0][0]).toContain(
        "Performance: logged_op completed",
      );
    });

    it("should summarize performance metrics", () => {
      logger.startTimer("op1").end(true);
      logger.startTimer("op2").end(false, "Error");
      logger.startTimer("op3").end(true);

      const summary = logger.getPerformanceMetrics();

      expect(summary.total).toBe(3);
      expect(summary.successful).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.averageDuration).toBeGreaterThanOrEqual(0);
    });

    it("should limit performance metrics history", () => {
      for (let i = 0; i < 1010; i++) {
        logger.startTimer(`op${i}`).end(true);
      }

      expect(logger.getPerformanceMetrics().total).toBe(1000);
    });
  });

  describe("Configuration", () => {
    it("should respect custom configuration", () => {
      const config: LoggerConfig = {
        minLevel: LogLevel.ERROR,
        enableStderr: true,
        enableMcpNotifications: false,
        includeTimestamp: false,
        includeContext: false,
        maxContextDepth: 1,
      };
      logger = new Logger(config);

      logger.info("should not output");
      logger.error("Failed", { operation: "hidden" }, { nested: { a: 1 } });

      expect(mockConsoleError).toHaveBeenCalledTimes(1);
      expect(mockConsoleError.mock.calls[0][0]).toBe(
        "[ERROR] Failed data={nested: [max depth reached]}",
      );
    });

    it("should allow disabling stderr output", () => {
      logger = new Logger({ enableStderr: false });
      logger.error("no stderr");

      expect(mockConsoleError).not.toHaveBeenCalled();
    });
  });
});

describe("PerformanceTimer", () => {
  it("should be created through child logger", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const child = new Logger().child("TestService");
    const timer = child.startTimer("operation");

    expect(timer).toBeInstanceOf(PerformanceTimer);
    expect(timer.end(true).operation).toBe("operation");
  });
});
