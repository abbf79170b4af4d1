/**
 * NodeLogService - Logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Single rotating log file: `<home>/logs/chv.log`
 * - Environment variable configuration for level and console output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { join } from "node:path";
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types.js";
import { LogLevel as LogLevelValues } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/**
 * Level used when CHV_LOGLEVEL is not set.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Log file name inside the logs directory.
 */
export const LOG_FILE_NAME = "chv.log";

/**
 * Rotate the log file once it grows past this size (bytes).
 */
const LOG_FILE_MAX_SIZE = 1024 * 1024;

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @param context - Context object to format
 * @returns Formatted string like "key1=value1 key2=value2"
 */
function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevelValues).includes(value);
}

/**
 * Parse and validate CHV_LOGLEVEL environment variable.
 *
 * @param envValue - Raw environment variable value
 * @returns Valid log level or undefined if invalid
 */
function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  private readonly scope: ElectronLogScope;

  constructor(scope: ElectronLogScope) {
    this.scope = scope;
  }

  silly(message: string, context?: LogContext): void {
    this.scope.silly(this.compose(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(this.compose(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(this.compose(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(this.compose(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = this.compose(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }

  private compose(message: string, context: LogContext | undefined): string {
    const contextStr = formatContext(context);
    return contextStr ? `${message} ${contextStr}` : message;
  }
}

/**
 * Parse CHV_LOGGER env var to get set of allowed logger names.
 *
 * @param envValue - Raw environment variable value (comma-separated logger names)
 * @returns Set of allowed names, or undefined if not set (allow all)
 */
function parseLoggerFilter(envValue: string | undefined): Set<string> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly inner: Logger;
  private readonly enabled: boolean;

  constructor(inner: Logger, allowedLoggers: Set<string> | undefined, name: LoggerName) {
    this.inner = inner;
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service backed by electron-log.
 *
 * Configuration:
 * - Default level: WARN
 * - Override via CHV_LOGLEVEL environment variable
 * - Console output (stderr) via CHV_PRINT_LOGS (any non-empty value)
 * - Logger filtering via CHV_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService(pathProvider);
 * const logger = loggingService.createLogger("installer");
 * logger.info("Installed", { version: "25.12.5.44" });
 * // Output: [2026-01-16 10:30:00.123] [info] [installer] Installed version=25.12.5.44
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly enableConsole: boolean;
  private readonly allowedLoggers: Set<string> | undefined;

  constructor(pathProvider: Pick<PathProvider, "logsDir">) {
    this.logLevel = parseLogLevel(process.env.CHV_LOGLEVEL) ?? DEFAULT_LOG_LEVEL;
    this.enableConsole = !!process.env.CHV_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(process.env.CHV_LOGGER);

    const logPath = join(pathProvider.logsDir, LOG_FILE_NAME);
    log.transports.file.resolvePathFn = (): string => logPath;
    log.transports.file.level = this.logLevel;
    log.transports.file.maxSize = LOG_FILE_MAX_SIZE;
    log.transports.file.format = LOG_FORMAT;

    log.transports.console.level = this.enableConsole ? this.logLevel : false;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * If CHV_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
