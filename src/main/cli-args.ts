/**
 * Command-line argument parsing using Node.js parseArgs.
 *
 * Global flags (--json, --help, --version) may appear anywhere before the
 * command. For `run`, everything after the launch mode is handed to the
 * binary untouched; a leading `--` is dropped.
 */

import { parseArgs } from "node:util";
import { LAUNCH_MODES, type LaunchMode } from "../services/launcher/index.js";
import { getErrorMessage } from "../shared/error-utils.js";

export const COMMAND_NAMES = ["install", "list", "use", "which", "remove", "init", "run"] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type CliCommand =
  | { readonly name: "install"; readonly spec: string }
  | { readonly name: "list"; readonly remote: boolean }
  | { readonly name: "use"; readonly spec: string }
  | { readonly name: "which" }
  | { readonly name: "remove"; readonly version: string; readonly force: boolean }
  | { readonly name: "init" }
  | {
      readonly name: "run";
      readonly mode: LaunchMode | null;
      readonly sql: string | null;
      readonly args: readonly string[];
    }
  | { readonly name: "help"; readonly topic: CommandName | null }
  | { readonly name: "version" };

export interface ParsedArgs {
  readonly command: CliCommand;
  /** Machine-readable output */
  readonly json: boolean;
}

/**
 * Invalid command line. Reported with usage and exit code 2.
 */
export class UsageError extends Error {
  constructor(
    message: string,
    readonly topic: CommandName | null = null
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export const isCommandName = (value: string): value is CommandName =>
  COMMAND_NAMES.some((name) => name === value);

export const isLaunchMode = (value: string): value is LaunchMode =>
  LAUNCH_MODES.some((mode) => mode === value);

const GLOBAL_OPTIONS = {
  json: { type: "boolean" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
} as const;

const COMMAND_OPTIONS = {
  ...GLOBAL_OPTIONS,
  remote: { type: "boolean" },
  force: { type: "boolean", short: "f" },
} as const;

const RUN_OPTIONS = {
  ...GLOBAL_OPTIONS,
  sql: { type: "string", short: "s" },
} as const;

export const USAGE = `chv - ClickHouse version manager

Usage: chv [--json] <command> [options]

Commands:
  install <spec>              Install a version (stable, lts, 25.12, 25.12.5.44)
  list [--remote]             List installed versions, or downloadable ones
  use <spec>                  Set the default version
  which                       Show the default version and binary path
  remove <version> [--force]  Remove an installed version
  init                        Create .clickhouse/ in the current directory
  run [--sql <query>] [local|client|server] [-- args...]
                              Run the default version

Options:
  --json                      Print results as JSON
  -h, --help                  Show help
  -V, --version               Show the chv version

Typical workflow: chv install stable && chv use stable && chv run server`;

export const COMMAND_HELP: Readonly<Record<CommandName, string>> = {
  install: `Usage: chv install <spec>

Downloads a ClickHouse binary to ~/.clickhouse/versions/<version>/.
<spec> is stable, lts, a partial version like 25.12, or an exact one like 25.12.5.44.
Related: chv list --remote, chv use <spec>`,
  list: `Usage: chv list [--remote]

Without flags, shows installed versions and marks the default.
With --remote, shows the newest versions available for download.`,
  use: `Usage: chv use <spec>

Sets the default version used by chv run. The version must be installed.
Partial specs pick the newest installed match.`,
  which: `Usage: chv which

Shows the default version and its binary path.`,
  remove: `Usage: chv remove <version> [--force]

Removes an installed exact version, as shown by chv list.
The default version is only removed with --force.`,
  init: `Usage: chv init

Creates .clickhouse/ in the current directory for project-local server data.
chv run server does this on first use.`,
  run: `Usage: chv run --sql <query>
       chv run server [args...]
       chv run client [args...]
       chv run local [args...]

Runs the default version. Server data lives in .clickhouse/<version>/.
Pass extra arguments after the mode, e.g. chv run server -- --http_port=9000`,
};

/**
 * Parse process arguments (without the node and script entries).
 *
 * @throws UsageError for unknown options, missing or extra arguments
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const commandIndex = argv.findIndex((arg) => !arg.startsWith("-"));
  const globalArgs = commandIndex === -1 ? argv : argv.slice(0, commandIndex);
  const global = parseOrThrow(null, () =>
    parseArgs({ args: [...globalArgs], options: GLOBAL_OPTIONS, strict: true })
  );
  const json = global.values.json ?? false;

  if (global.values.version) {
    return { command: { name: "version" }, json };
  }

  const commandArg = commandIndex === -1 ? undefined : argv[commandIndex];
  if (commandArg === undefined) {
    if (global.values.help) {
      return { command: { name: "help", topic: null }, json };
    }
    throw new UsageError("No command given");
  }
  if (!isCommandName(commandArg)) {
    throw new UsageError(`Unknown command "${commandArg}"`);
  }

  const rest = argv.slice(commandIndex + 1);
  if (commandArg === "run") {
    return parseRun(rest, json, global.values.help ?? false);
  }
  return parseSimpleCommand(commandArg, rest, json, global.values.help ?? false);
}

function parseSimpleCommand(
  name: Exclude<CommandName, "run">,
  rest: readonly string[],
  globalJson: boolean,
  globalHelp: boolean
): ParsedArgs {
  const { values, positionals } = parseOrThrow(name, () =>
    parseArgs({ args: [...rest], options: COMMAND_OPTIONS, allowPositionals: true, strict: true })
  );
  const json = globalJson || (values.json ?? false);
  if (globalHelp || values.help) {
    return { command: { name: "help", topic: name }, json };
  }
  if (values.remote !== undefined && name !== "list") {
    throw new UsageError(`Option --remote is only valid for list`, name);
  }
  if (values.force !== undefined && name !== "remove") {
    throw new UsageError(`Option --force is only valid for remove`, name);
  }

  switch (name) {
    case "install":
    case "use": {
      const spec = expectOne(positionals, name, "<spec>");
      return { command: { name, spec }, json };
    }
    case "remove": {
      const version = expectOne(positionals, name, "<version>");
      return { command: { name, version, force: values.force ?? false }, json };
    }
    case "list":
      expectNone(positionals, name);
      return { command: { name, remote: values.remote ?? false }, json };
    case "which":
    case "init":
      expectNone(positionals, name);
      return { command: { name }, json };
  }
}

function parseRun(
  rest: readonly string[],
  globalJson: boolean,
  globalHelp: boolean
): ParsedArgs {
  const { head, mode, passthrough } = splitRunArgs(rest);
  const { values, positionals } = parseOrThrow("run", () =>
    parseArgs({ args: [...head], options: RUN_OPTIONS, allowPositionals: true, strict: true })
  );
  const json = globalJson || (values.json ?? false);
  if (globalHelp || values.help) {
    return { command: { name: "help", topic: "run" }, json };
  }
  const [extra] = positionals;
  if (extra !== undefined) {
    throw new UsageError(`Unknown run mode "${extra}". Expected local, client or server`, "run");
  }
  return {
    command: { name: "run", mode, sql: values.sql ?? null, args: passthrough },
    json,
  };
}

/**
 * Split `run` arguments at the launch mode. Arguments before it are chv
 * options; the value of --sql is never taken for a mode.
 */
export function splitRunArgs(rest: readonly string[]): {
  head: readonly string[];
  mode: LaunchMode | null;
  passthrough: readonly string[];
} {
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) break;
    if (arg === "--") {
      return { head: rest.slice(0, i), mode: null, passthrough: rest.slice(i + 1) };
    }
    if (arg === "--sql" || arg === "-s") {
      i++;
      continue;
    }
    if (isLaunchMode(arg)) {
      const tail = rest.slice(i + 1);
      return {
        head: rest.slice(0, i),
        mode: arg,
        passthrough: tail[0] === "--" ? tail.slice(1) : tail,
      };
    }
  }
  return { head: rest, mode: null, passthrough: [] };
}

function parseOrThrow<T>(topic: CommandName | null, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new UsageError(getErrorMessage(error), topic);
  }
}

function expectOne(positionals: readonly string[], name: CommandName, label: string): string {
  const [value, ...extra] = positionals;
  if (value === undefined) {
    throw new UsageError(`Missing argument ${label}`, name);
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument "${extra.join(" ")}"`, name);
  }
  return value;
}

function expectNone(positionals: readonly string[], name: CommandName): void {
  if (positionals.length > 0) {
    throw new UsageError(`Unexpected argument "${positionals.join(" ")}"`, name);
  }
}
