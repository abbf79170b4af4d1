/**
 * Test utilities for process module.
 */
import { vi, type Mock } from "vitest";
import type { InteractiveResult, ProcessOptions, ProcessRunner } from "./process.js";

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  runInteractive: Mock<
    (command: string, args: readonly string[], options?: ProcessOptions) => Promise<InteractiveResult>
  >;
}

/**
 * Create a mock ProcessRunner resolving with the given result.
 * Defaults to a clean exit (code 0).
 */
export function createMockProcessRunner(result?: InteractiveResult): MockProcessRunner {
  return {
    runInteractive: vi.fn().mockResolvedValue(result ?? { exitCode: 0 }),
  };
}
