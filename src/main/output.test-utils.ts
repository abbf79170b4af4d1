/**
 * Test utilities for command output.
 */

import type { CommandOutput } from "./output.js";

/**
 * CommandOutput that records every line instead of writing it.
 */
export interface RecordingOutput extends CommandOutput {
  readonly stdout: string[];
  readonly stderr: string[];
  /** Every status line shown, in order */
  readonly statuses: string[];
}

/**
 * Create a RecordingOutput.
 *
 * @example
 * const output = createRecordingOutput();
 * await runner.execute({ name: "which" }, { json: false });
 * expect(output.stdout).toEqual(["25.12.5.44 (/home/.../clickhouse)"]);
 */
export function createRecordingOutput(): RecordingOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const statuses: string[] = [];
  return {
    stdout,
    stderr,
    statuses,
    line: (text) => {
      stdout.push(text);
    },
    error: (text) => {
      stderr.push(text);
    },
    status: (text) => {
      statuses.push(text);
    },
    clearStatus: () => {},
  };
}
