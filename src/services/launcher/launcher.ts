/**
 * Launcher contract: hand a validated binary path and data directory to
 * whatever runs the process.
 */

import type { Logger } from "../logging/types.js";
import { VersionStoreError } from "../errors.js";
import type { ProjectDataScoper } from "../project-data/project-data-scoper.js";
import type { VersionStore } from "../version-manager/version-store.js";
import type { Version } from "../version-manager/types.js";
import { formatVersion } from "../version-manager/version-spec.js";
import type { LaunchMode, LaunchOptions, LaunchPlan } from "./types.js";

/** Server flags that keep data under the version's project data dir. */
export const SERVER_DATA_ARGS: readonly string[] = ["--", "--path=./data/"];

/**
 * True if the user passed their own server config file.
 */
export function hasConfigFileArg(args: readonly string[]): boolean {
  return args.some((arg) => arg.startsWith("--config-file") || arg.startsWith("-C"));
}

/**
 * Dependencies for Launcher.
 */
export interface LauncherDeps {
  readonly store: VersionStore;
  readonly projectData: ProjectDataScoper;
  readonly logger: Logger;
}

export class Launcher {
  private readonly store: VersionStore;
  private readonly projectData: ProjectDataScoper;
  private readonly logger: Logger;

  constructor(deps: LauncherDeps) {
    this.store = deps.store;
    this.projectData = deps.projectData;
    this.logger = deps.logger;
  }

  /**
   * Binary path for an explicit version, or for the default when omitted.
   *
   * @throws VersionStoreError NOT_INSTALLED, NO_DEFAULT_SET or CORRUPT_DEFAULT
   */
  async resolveBinary(version?: Version | null): Promise<string> {
    const { binaryPath } = await this.resolveTarget(version);
    return binaryPath;
  }

  /**
   * Data directory for a run: only the server gets one.
   */
  async resolveDataDir(version: Version, mode: LaunchMode): Promise<string | null> {
    if (mode !== "server") {
      return null;
    }
    return this.projectData.ensureProjectDir(version);
  }

  /**
   * Build the command line for a run.
   *
   * - sql: `<bin> local --query <sql>`
   * - local / client: `<bin> <mode> ...args`
   * - server: `<bin> server ...args`, run in the project data dir with
   *   `-- --path=./data/` appended unless a config file is given
   */
  async planLaunch(
    mode: LaunchMode,
    args: readonly string[],
    options?: LaunchOptions
  ): Promise<LaunchPlan> {
    const { version, binaryPath } = await this.resolveTarget(options?.version);

    let plan: LaunchPlan;
    if (options?.sql !== undefined) {
      plan = { binaryPath, args: ["local", "--query", options.sql], cwd: null, version };
    } else if (mode === "server" && !hasConfigFileArg(args)) {
      const cwd = await this.resolveDataDir(version, mode);
      plan = { binaryPath, args: ["server", ...args, ...SERVER_DATA_ARGS], cwd, version };
    } else {
      plan = { binaryPath, args: [mode, ...args], cwd: null, version };
    }

    this.logger.debug("Launch planned", {
      version: formatVersion(version),
      mode: options?.sql !== undefined ? "sql" : mode,
      cwd: plan.cwd,
    });
    return plan;
  }

  /**
   * Version and binary path for an explicit version, or for the default when omitted.
   *
   * @throws VersionStoreError NOT_INSTALLED, NO_DEFAULT_SET or CORRUPT_DEFAULT
   */
  async resolveTarget(
    version?: Version | null
  ): Promise<{ version: Version; binaryPath: string }> {
    if (version) {
      return { version, binaryPath: await this.store.requireInstalled(version) };
    }
    const defaultVersion = await this.store.getDefault();
    if (!defaultVersion) {
      throw new VersionStoreError(
        "No default version set. Run: chv use <version>",
        "NO_DEFAULT_SET"
      );
    }
    return { version: defaultVersion, binaryPath: this.store.pathFor(defaultVersion) };
  }
}

/**
 * Create a Launcher instance.
 */
export function createLauncher(deps: LauncherDeps): Launcher {
  return new Launcher(deps);
}
