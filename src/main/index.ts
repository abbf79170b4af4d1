#!/usr/bin/env node
/**
 * CLI entry point.
 * Parses arguments, wires the services and runs one command.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DefaultPathProvider } from "../services/platform/path-provider.js";
import { NodePlatformInfo, type PlatformInfo } from "../services/platform/platform-info.js";
import { NodeLogService } from "../services/logging/index.js";
import { getErrorMessage } from "../shared/error-utils.js";
import { COMMAND_HELP, USAGE, UsageError, parseCliArgs, type ParsedArgs } from "./cli-args.js";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, reportError } from "./commands.js";
import { ConsoleOutput, type CommandOutput } from "./output.js";
import { initializeBootstrap } from "./bootstrap.js";

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json, two levels above this module in both src/ and dist/.
 */
export function readPackageVersion(): string {
  const content = readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
  return packageJsonSchema.parse(JSON.parse(content)).version;
}

/**
 * Where interrupt signals come from.
 */
export interface InterruptSource {
  on(event: "SIGINT", listener: () => void): unknown;
  off(event: "SIGINT", listener: () => void): unknown;
}

/**
 * Abort a signal on Ctrl-C. Every interrupt is caught until released.
 */
export function trapInterrupts(source: InterruptSource = process): {
  signal: AbortSignal;
  release: () => void;
} {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  source.on("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    release: () => {
      source.off("SIGINT", onInterrupt);
    },
  };
}

export interface MainOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly output?: CommandOutput;
  readonly platformInfo?: PlatformInfo;
}

/**
 * Run the CLI for the given arguments.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const output = options.output ?? new ConsoleOutput();
  const env = options.env ?? process.env;

  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    output.error(`Error: ${error.message}`);
    output.error("");
    output.error(error.topic ? COMMAND_HELP[error.topic] : USAGE);
    return EXIT_USAGE;
  }

  const { command, json } = parsed;
  if (command.name === "help") {
    output.line(command.topic ? COMMAND_HELP[command.topic] : USAGE);
    return EXIT_SUCCESS;
  }
  if (command.name === "version") {
    output.line(`chv ${readPackageVersion()}`);
    return EXIT_SUCCESS;
  }

  const platformInfo = options.platformInfo ?? new NodePlatformInfo();
  const cwd = options.cwd ?? process.cwd();
  const pathProvider = new DefaultPathProvider(platformInfo, env, cwd);
  const loggingService = new NodeLogService(pathProvider);
  const logger = loggingService.createLogger("cli");

  const interrupts = trapInterrupts();

  try {
    const { runner } = await initializeBootstrap({
      platformInfo,
      pathProvider,
      loggingService,
      output,
      cwd,
      userAgent: `chv/${readPackageVersion()}`,
      env,
    });
    return await runner.execute(command, { json, signal: interrupts.signal });
  } catch (error) {
    return reportError(error, json, output, logger);
  } finally {
    interrupts.release();
    loggingService.dispose();
  }
}

if (!process.env.VITEST) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
