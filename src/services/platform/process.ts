/**
 * Process launching for the `run` command.
 */

import { execa } from "execa";
import type { Logger } from "../logging/types.js";

/**
 * Signals forwarded to the child while it runs. SIGINT is left to the
 * terminal, which already delivers it to the whole foreground process group.
 */
const FORWARDED_SIGNALS = ["SIGTERM", "SIGHUP"] as const;

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
}

/**
 * Result of an interactive process run.
 */
export interface InteractiveResult {
  /**
   * Exit code, or null if the process didn't exit normally.
   * null when: killed by signal or spawn error.
   */
  readonly exitCode: number | null;
  /** Signal name if the process was killed (e.g., 'SIGTERM') */
  readonly signal?: string;
  /** Spawn error message (e.g. ENOENT, EACCES) */
  readonly error?: string;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Run a process attached to the current terminal (inherited stdio) and
   * wait for it to exit. Never throws for exit status or spawn errors;
   * check result fields instead.
   *
   * @example
   * const result = await runner.runInteractive(binaryPath, ["local", "--query", "SELECT 1"]);
   * process.exitCode = result.exitCode ?? 1;
   */
  runInteractive(
    command: string,
    args: readonly string[],
    options?: ProcessOptions
  ): Promise<InteractiveResult>;
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  async runInteractive(
    command: string,
    args: readonly string[],
    options?: ProcessOptions
  ): Promise<InteractiveResult> {
    const subprocess = execa(command, [...args], {
      stdio: "inherit",
      reject: false,
      ...(options?.cwd !== undefined && { cwd: options.cwd }),
    });

    if (subprocess.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: subprocess.pid });
    }

    const forward = (signal: NodeJS.Signals): void => {
      subprocess.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) {
      process.on(signal, forward);
    }

    try {
      const result = await subprocess;

      if (result.signal !== undefined) {
        this.logger.warn("Killed", { command, signal: result.signal });
        return { exitCode: null, signal: result.signal };
      }
      if (result.exitCode === undefined) {
        const error = result.failed && result instanceof Error ? result.message : "spawn failed";
        this.logger.error("Spawn failed", { command, error });
        return { exitCode: null, error };
      }

      this.logger.debug("Exited", { command, exitCode: result.exitCode });
      return { exitCode: result.exitCode };
    } finally {
      for (const signal of FORWARDED_SIGNALS) {
        process.off(signal, forward);
      }
    }
  }
}
