/**
 * Unit tests for NodeLogService.
 *
 * Note: These tests mock electron-log to verify configuration logic.
 */

import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const mocks = vi.hoisted(() => ({
  scope: vi.fn(),
  transports: {
    file: {
      resolvePathFn: undefined as ((variables: unknown) => string) | undefined,
      level: undefined as string | false | undefined,
      maxSize: undefined as number | undefined,
      format: undefined as string | undefined,
    },
    console: {
      level: undefined as string | false | undefined,
      format: undefined as string | undefined,
    },
  },
}));

vi.mock("electron-log/node", () => ({
  default: {
    scope: mocks.scope,
    transports: mocks.transports,
  },
}));

function createScopeLogger() {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("NodeLogService", () => {
  const originalEnv = process.env;
  let scopeLogger: ReturnType<typeof createScopeLogger>;

  beforeEach(() => {
    vi.resetAllMocks();
    process.env = { ...originalEnv };
    delete process.env.CHV_LOGLEVEL;
    delete process.env.CHV_PRINT_LOGS;
    delete process.env.CHV_LOGGER;

    mocks.transports.file.resolvePathFn = undefined;
    mocks.transports.file.level = undefined;
    mocks.transports.file.maxSize = undefined;
    mocks.transports.file.format = undefined;
    mocks.transports.console.level = undefined;
    mocks.transports.console.format = undefined;

    scopeLogger = createScopeLogger();
    mocks.scope.mockReturnValue(scopeLogger);
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  async function createService(logsDir = join("/test", "home", "logs")) {
    const { NodeLogService } = await import("./node-log-service.js");
    return new NodeLogService({ logsDir });
  }

  describe("log level configuration", () => {
    it("uses WARN level by default", async () => {
      await createService();
      expect(mocks.transports.file.level).toBe("warn");
    });

    it("respects CHV_LOGLEVEL env var", async () => {
      process.env.CHV_LOGLEVEL = "info";
      await createService();
      expect(mocks.transports.file.level).toBe("info");
    });

    it("handles uppercase CHV_LOGLEVEL", async () => {
      process.env.CHV_LOGLEVEL = "DEBUG";
      await createService();
      expect(mocks.transports.file.level).toBe("debug");
    });

    it("falls back to default for invalid CHV_LOGLEVEL", async () => {
      process.env.CHV_LOGLEVEL = "verbose";
      await createService();
      expect(mocks.transports.file.level).toBe("warn");
    });
  });

  describe("console transport configuration", () => {
    it("disables console by default", async () => {
      await createService();
      expect(mocks.transports.console.level).toBe(false);
    });

    it("enables console at the file level when CHV_PRINT_LOGS is set", async () => {
      process.env.CHV_PRINT_LOGS = "1";
      process.env.CHV_LOGLEVEL = "silly";
      await createService();
      expect(mocks.transports.console.level).toBe("silly");
    });
  });

  describe("file transport configuration", () => {
    it("writes to chv.log in the logs directory", async () => {
      await createService(join("/data", "logs"));

      const pathFn = mocks.transports.file.resolvePathFn;
      expect(pathFn).toBeDefined();
      expect(pathFn?.({})).toBe(join("/data", "logs", "chv.log"));
    });

    it("limits file size and sets the shared format", async () => {
      await createService();
      expect(mocks.transports.file.maxSize).toBe(1024 * 1024);
      expect(mocks.transports.file.format).toBe(
        "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}"
      );
      expect(mocks.transports.console.format).toBe(mocks.transports.file.format);
    });
  });

  describe("createLogger", () => {
    it("creates logger with bracketed scope", async () => {
      const service = await createService();
      service.createLogger("installer");

      expect(mocks.scope).toHaveBeenCalledWith("[installer]");
    });

    it("caches loggers for same name", async () => {
      const service = await createService();
      const logger1 = service.createLogger("fs");
      const logger2 = service.createLogger("fs");

      expect(logger1).toBe(logger2);
      expect(mocks.scope).toHaveBeenCalledTimes(1);
    });

    it("creates a new scope after dispose", async () => {
      const service = await createService();
      service.createLogger("fs");
      service.dispose();
      service.createLogger("fs");

      expect(mocks.scope).toHaveBeenCalledTimes(2);
    });
  });

  describe("Logger methods", () => {
    it("formats context as key=value pairs", async () => {
      const service = await createService();
      const logger = service.createLogger("installer");

      logger.info("Installed", { version: "25.12.5.44", alreadyInstalled: false });

      expect(scopeLogger.info).toHaveBeenCalledWith(
        "Installed version=25.12.5.44 alreadyInstalled=false"
      );
    });

    it("handles null and numeric values", async () => {
      const service = await createService();
      const logger = service.createLogger("network");

      logger.debug("Fetch complete", { status: 200, total: null });

      expect(scopeLogger.debug).toHaveBeenCalledWith("Fetch complete status=200 total=null");
    });

    it("passes message through unchanged without context", async () => {
      const service = await createService();
      service.createLogger("cli").silly("Dispatch");

      expect(scopeLogger.silly).toHaveBeenCalledWith("Dispatch");
    });

    it("includes Error object in error logs", async () => {
      const service = await createService();
      const testError = new Error("boom");

      service.createLogger("cli").error("Command failed", { command: "install" }, testError);

      expect(scopeLogger.error).toHaveBeenCalledWith("Command failed command=install", testError);
    });
  });

  describe("CHV_LOGGER filtering", () => {
    it("only logs from listed loggers", async () => {
      process.env.CHV_LOGGER = " network , fs ";
      const service = await createService();

      service.createLogger("installer").warn("Hidden");
      service.createLogger("fs").warn("Shown");

      expect(scopeLogger.warn).toHaveBeenCalledTimes(1);
      expect(scopeLogger.warn).toHaveBeenCalledWith("Shown");
    });

    it("allows all loggers when CHV_LOGGER is empty", async () => {
      process.env.CHV_LOGGER = "";
      const service = await createService();

      service.createLogger("launcher").info("Visible");

      expect(scopeLogger.info).toHaveBeenCalledWith("Visible");
    });
  });
});
