/**
 * Logging module exports.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel } from "./types.js";
export { NodeLogService, DEFAULT_LOG_LEVEL, LOG_FILE_NAME } from "./node-log-service.js";

import type { Logger } from "./types.js";

/**
 * Logger that discards everything. Default for services constructed without one.
 */
export const SILENT_LOGGER: Logger = {
  silly: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
