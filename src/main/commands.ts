/**
 * Command handlers. Each handler drives the services and renders the result
 * as text or, with --json, as one JSON document on stdout.
 */

import os from "node:os";
import type { ReleaseCatalog } from "../services/release-catalog/index.js";
import {
  formatVersion,
  formatVersionSpec,
  parseExactVersion,
  parseVersionSpec,
  resolveInstalled,
  resolveRelease,
  sortReleasesDescending,
  type Installer,
  type Version,
  type VersionSpec,
  type VersionStore,
} from "../services/version-manager/index.js";
import type { ProjectDataScoper } from "../services/project-data/index.js";
import type { Launcher } from "../services/launcher/index.js";
import type { ProcessRunner } from "../services/platform/process.js";
import type { Logger } from "../services/logging/index.js";
import {
  VersionResolutionError,
  VersionStoreError,
  getErrorMessage,
  isServiceError,
} from "../services/errors.js";
import { COMMAND_HELP, type CliCommand } from "./cli-args.js";
import { formatProgress, type CommandOutput } from "./output.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Releases shown by `list --remote` in text mode */
export const REMOTE_LIST_LIMIT = 20;

/**
 * Commands that need the services. Help and version are answered before
 * the services exist.
 */
export type ServiceCommand = Exclude<CliCommand, { name: "help" } | { name: "version" }>;

export interface CommandDeps {
  readonly catalog: ReleaseCatalog;
  readonly store: VersionStore;
  readonly installer: Installer;
  readonly projectData: ProjectDataScoper;
  readonly launcher: Launcher;
  readonly processRunner: ProcessRunner;
  readonly output: CommandOutput;
  readonly logger: Logger;
}

export interface ExecuteOptions {
  readonly json: boolean;
  /** Aborts catalog requests and downloads */
  readonly signal?: AbortSignal;
}

/**
 * Print an error and return the failing exit code.
 * Service errors are expected outcomes; anything else is logged with its stack.
 */
export function reportError(
  error: unknown,
  json: boolean,
  output: CommandOutput,
  logger: Logger
): number {
  if (isServiceError(error)) {
    logger.warn("Command failed", { type: error.type, code: error.code ?? null });
    if (json) {
      output.line(JSON.stringify({ error: error.toJSON() }, null, 2));
    } else {
      output.error(`Error: ${error.message}`);
    }
    return EXIT_FAILURE;
  }

  logger.error(
    "Unexpected error",
    { error: getErrorMessage(error) },
    error instanceof Error ? error : undefined
  );
  if (json) {
    output.line(
      JSON.stringify({ error: { type: "internal", message: getErrorMessage(error) } }, null, 2)
    );
  } else {
    output.error(`Error: ${getErrorMessage(error)}`);
  }
  return EXIT_FAILURE;
}

/**
 * Exit status of a child killed by a signal, as a shell reports it.
 */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : EXIT_FAILURE;
}

/**
 * Runs parsed commands against the services.
 */
export class CommandRunner {
  private readonly catalog: ReleaseCatalog;
  private readonly store: VersionStore;
  private readonly installer: Installer;
  private readonly projectData: ProjectDataScoper;
  private readonly launcher: Launcher;
  private readonly processRunner: ProcessRunner;
  private readonly output: CommandOutput;
  private readonly logger: Logger;

  constructor(deps: CommandDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.installer = deps.installer;
    this.projectData = deps.projectData;
    this.launcher = deps.launcher;
    this.processRunner = deps.processRunner;
    this.output = deps.output;
    this.logger = deps.logger;
  }

  /**
   * Run one command. Never throws; failures are printed.
   *
   * @returns Process exit code
   */
  async execute(command: ServiceCommand, options: ExecuteOptions): Promise<number> {
    this.logger.debug("Dispatch", { command: command.name, json: options.json });
    try {
      switch (command.name) {
        case "install":
          return await this.install(command.spec, options);
        case "list":
          return command.remote
            ? await this.listRemote(options)
            : await this.listInstalled(options);
        case "use":
          return await this.use(command.spec, options);
        case "which":
          return await this.which(options);
        case "remove":
          return await this.remove(command.version, command.force, options);
        case "init":
          return await this.init(options);
        case "run":
          return await this.run(command);
      }
    } catch (error) {
      this.output.clearStatus();
      return reportError(error, options.json, this.output, this.logger);
    }
  }

  private async install(input: string, options: ExecuteOptions): Promise<number> {
    const spec = parseVersionSpec(input);
    this.output.status(`Resolving version ${formatVersionSpec(spec)}...`);

    const result = await this.installer.install(spec, {
      onProgress: (progress) => this.output.status(formatProgress(progress)),
      ...(options.signal !== undefined && { signal: options.signal }),
    });
    this.output.clearStatus();
    const version = formatVersion(result.version);

    if (options.json) {
      this.printJson({
        version,
        tag: result.tag,
        channel: result.channel,
        binaryPath: result.binaryPath,
        alreadyInstalled: result.alreadyInstalled,
      });
      return EXIT_SUCCESS;
    }

    if (result.channel !== null) {
      this.output.line(`Resolved to version ${version} (${result.channel})`);
    }
    this.output.line(
      result.alreadyInstalled
        ? `ClickHouse ${version} is already installed`
        : `ClickHouse ${version} installed successfully`
    );
    return EXIT_SUCCESS;
  }

  private async listInstalled(options: ExecuteOptions): Promise<number> {
    await this.store.sweepOrphans();
    const installed = await this.store.listInstalled();
    const defaultVersion = await this.readDefaultForListing();
    const defaultName = defaultVersion ? formatVersion(defaultVersion) : null;

    if (options.json) {
      this.printJson({ installed: installed.map(formatVersion), default: defaultName });
      return EXIT_SUCCESS;
    }

    if (installed.length === 0) {
      this.output.line("No versions installed");
      this.output.line("Run: chv install stable");
      return EXIT_SUCCESS;
    }

    this.output.line("Installed versions:");
    for (const version of installed) {
      const name = formatVersion(version);
      this.output.line(name === defaultName ? `  ${name} (default)` : `  ${name}`);
    }
    return EXIT_SUCCESS;
  }

  /**
   * A broken pointer should not hide the installed versions; it is reported
   * as a warning here and as an error everywhere else.
   */
  private async readDefaultForListing(): Promise<Version | null> {
    try {
      return await this.store.getDefault();
    } catch (error) {
      if (error instanceof VersionStoreError && error.code === "CORRUPT_DEFAULT") {
        this.output.error(`Warning: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async listRemote(options: ExecuteOptions): Promise<number> {
    this.output.status("Fetching available versions...");
    const releases = sortReleasesDescending(await this.catalog.listReleases(options.signal));
    this.output.clearStatus();
    const installed = new Set((await this.store.listInstalled()).map(formatVersion));

    if (options.json) {
      this.printJson({
        releases: releases.map((entry) => ({
          version: formatVersion(entry.version),
          tag: entry.tag,
          channel: entry.channel,
          publishedAt: entry.publishedAt.toISOString(),
          installed: installed.has(formatVersion(entry.version)),
        })),
      });
      return EXIT_SUCCESS;
    }

    if (releases.length === 0) {
      this.output.line("No versions available");
      return EXIT_SUCCESS;
    }

    this.output.line("Available versions:");
    for (const entry of releases.slice(0, REMOTE_LIST_LIMIT)) {
      const name = formatVersion(entry.version);
      const suffix = installed.has(name) ? " (installed)" : "";
      this.output.line(`  ${name} [${entry.channel}]${suffix}`);
    }
    if (releases.length > REMOTE_LIST_LIMIT) {
      this.output.line(`  ... and ${releases.length - REMOTE_LIST_LIMIT} more`);
    }
    return EXIT_SUCCESS;
  }

  private async use(input: string, options: ExecuteOptions): Promise<number> {
    const version = await this.resolveUseTarget(parseVersionSpec(input), options);
    await this.store.setDefault(version);
    const name = formatVersion(version);

    if (options.json) {
      this.printJson({ default: name });
    } else {
      this.output.line(`Default version set to ${name}`);
    }
    return EXIT_SUCCESS;
  }

  /**
   * Partial specs pick the newest installed match without touching the
   * network. Channel aliases need the catalog to know which version they mean.
   */
  private async resolveUseTarget(spec: VersionSpec, options: ExecuteOptions): Promise<Version> {
    switch (spec.kind) {
      case "exact":
        await this.store.requireInstalled(spec.version);
        return spec.version;
      case "partial": {
        const match = resolveInstalled(spec.components, await this.store.listInstalled());
        if (!match) {
          const label = formatVersionSpec(spec);
          throw new VersionStoreError(
            `No installed version matches "${label}". Run: chv install ${label}`,
            "NOT_INSTALLED"
          );
        }
        return match;
      }
      case "stable":
      case "lts": {
        const release = resolveRelease(spec, await this.catalog.listReleases(options.signal));
        await this.store.requireInstalled(release.version);
        return release.version;
      }
    }
  }

  private async which(options: ExecuteOptions): Promise<number> {
    const { version, binaryPath } = await this.launcher.resolveTarget();
    const name = formatVersion(version);

    if (options.json) {
      this.printJson({ version: name, binaryPath });
    } else {
      this.output.line(`${name} (${binaryPath})`);
    }
    return EXIT_SUCCESS;
  }

  private async remove(input: string, force: boolean, options: ExecuteOptions): Promise<number> {
    const version = parseExactVersion(input.trim());
    if (!version) {
      throw new VersionResolutionError(
        `Invalid version "${input}": remove takes an exact version as shown by chv list`,
        "INVALID_VERSION_SPEC"
      );
    }
    await this.store.remove(version, { force });
    const name = formatVersion(version);

    if (options.json) {
      this.printJson({ removed: name });
    } else {
      this.output.line(`Removed version ${name}`);
    }
    return EXIT_SUCCESS;
  }

  private async init(options: ExecuteOptions): Promise<number> {
    const result = await this.projectData.init();

    if (options.json) {
      this.printJson({ path: result.path, created: result.created });
    } else if (result.created) {
      this.output.line(`Initialized ClickHouse project in ${result.path}`);
    } else {
      this.output.line(`Already initialized at ${result.path}`);
    }
    return EXIT_SUCCESS;
  }

  private async run(command: Extract<ServiceCommand, { name: "run" }>): Promise<number> {
    if (command.mode === null && command.sql === null) {
      this.output.error(COMMAND_HELP.run);
      return EXIT_FAILURE;
    }

    const plan = await this.launcher.planLaunch(command.mode ?? "local", command.args, {
      ...(command.sql !== null && { sql: command.sql }),
    });
    const result = await this.processRunner.runInteractive(plan.binaryPath, plan.args, {
      ...(plan.cwd !== null && { cwd: plan.cwd }),
    });

    if (result.exitCode !== null) {
      return result.exitCode;
    }
    if (result.signal !== undefined) {
      return signalExitCode(result.signal);
    }
    this.output.error(
      `Error: Failed to start ${plan.binaryPath}: ${result.error ?? "unknown error"}`
    );
    return EXIT_FAILURE;
  }

  private printJson(value: unknown): void {
    this.output.line(JSON.stringify(value, null, 2));
  }
}

/**
 * Create a CommandRunner instance.
 */
export function createCommandRunner(deps: CommandDeps): CommandRunner {
  return new CommandRunner(deps);
}
