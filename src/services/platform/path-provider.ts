import { join, isAbsolute, resolve } from "node:path";
import type { PlatformInfo } from "./platform-info.js";

/** Directory name of the global store under the home directory. */
export const STORE_DIR_NAME = ".clickhouse";

/** Directory name of the project-local data root. */
export const PROJECT_DIR_NAME = ".clickhouse";

/** File name of the binary inside a version directory. */
export const BINARY_NAME = "clickhouse";

/**
 * Application path provider.
 * Every path the tool reads or writes is derived here.
 */
export interface PathProvider {
  /** Root of the global store: `~/.clickhouse/` (override: CHV_HOME), absolute */
  readonly baseDir: string;

  /** Directory of installed versions: `<base>/versions/` */
  readonly versionsDir: string;

  /** Default version pointer: `<base>/default` */
  readonly defaultFile: string;

  /** Optional configuration file: `<base>/config.json` */
  readonly configPath: string;

  /** Log directory: `<base>/logs/` */
  readonly logsDir: string;

  /**
   * Directory of one installed version.
   * @returns `<versionsDir>/<version>/`
   */
  versionDir(version: string): string;

  /**
   * Binary path of one installed version. No existence guarantee.
   * @returns `<versionsDir>/<version>/clickhouse`
   */
  binaryPath(version: string): string;

  /**
   * Project-local data root for a working directory.
   * @param projectRoot Absolute path to the project
   * @returns `<projectRoot>/.clickhouse/`
   * @throws TypeError if projectRoot is not an absolute path
   */
  projectDir(projectRoot: string): string;
}

/**
 * Default PathProvider implementation.
 *
 * Path structure:
 * - `CHV_HOME` when set, resolved against the working directory if relative
 * - otherwise `<home>/.clickhouse/` on every platform
 */
export class DefaultPathProvider implements PathProvider {
  readonly baseDir: string;
  readonly versionsDir: string;
  readonly defaultFile: string;
  readonly configPath: string;
  readonly logsDir: string;

  constructor(
    platformInfo: Pick<PlatformInfo, "homeDir">,
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ) {
    this.baseDir = this.computeBaseDir(platformInfo.homeDir, env.CHV_HOME, cwd);
    this.versionsDir = join(this.baseDir, "versions");
    this.defaultFile = join(this.baseDir, "default");
    this.configPath = join(this.baseDir, "config.json");
    this.logsDir = join(this.baseDir, "logs");
  }

  versionDir(version: string): string {
    return join(this.versionsDir, version);
  }

  binaryPath(version: string): string {
    return join(this.versionDir(version), BINARY_NAME);
  }

  projectDir(projectRoot: string): string {
    if (!projectRoot || !isAbsolute(projectRoot)) {
      throw new TypeError(`projectRoot must be an absolute path, got: "${projectRoot}"`);
    }
    return join(projectRoot, PROJECT_DIR_NAME);
  }

  private computeBaseDir(homeDir: string, override: string | undefined, cwd: string): string {
    const trimmed = override?.trim();
    if (trimmed) {
      return resolve(cwd, trimmed);
    }
    return join(homeDir, STORE_DIR_NAME);
  }
}
