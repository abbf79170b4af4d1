/**
 * Logger doubles for service tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LogContext } from "./types.js";

/**
 * Logger whose methods are spies.
 */
export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * Create a MockLogger.
 *
 * @example
 * const logger = createMockLogger();
 * await createReleaseCatalog({ httpClient, config, logger }).listReleases();
 * expect(logger.warn).toHaveBeenCalledWith("Catalog truncated", { pages: 100 });
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
