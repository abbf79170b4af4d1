/**
 * Project-local data directories: `<project>/.clickhouse/<version>/`.
 */

import { join, resolve } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger } from "../logging/types.js";
import { ProjectDataError, isNotFoundError } from "../errors.js";
import type { Version } from "../version-manager/types.js";
import { formatVersion } from "../version-manager/version-spec.js";

/** Marker written into a new project root so it stays out of version control. */
export const GITIGNORE_NAME = ".gitignore";
export const GITIGNORE_CONTENT = "*\n";

/**
 * Dependencies for ProjectDataScoper.
 */
export interface ProjectDataScoperDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: Pick<PathProvider, "projectDir" | "baseDir">;
  /** Absolute path of the project (the working directory) */
  readonly projectRoot: string;
  readonly logger: Logger;
}

/**
 * Result of ProjectDataScoper.init.
 */
export interface InitResult {
  readonly path: string;
  /** False when the project root already existed */
  readonly created: boolean;
}

/**
 * Scopes server data per project and version.
 */
export class ProjectDataScoper {
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;
  private readonly storeDir: string;
  /** Project data root: `<project>/.clickhouse/` */
  readonly localDir: string;

  constructor(deps: ProjectDataScoperDeps) {
    this.fileSystem = deps.fileSystem;
    this.logger = deps.logger;
    this.localDir = deps.pathProvider.projectDir(deps.projectRoot);
    this.storeDir = deps.pathProvider.baseDir;
  }

  /**
   * Create the project root with its marker. Leaves an existing root alone.
   *
   * @throws ProjectDataError PROJECT_IS_STORE when the root is the global store
   */
  async init(): Promise<InitResult> {
    this.assertNotStore();
    if (await this.exists(this.localDir)) {
      return { path: this.localDir, created: false };
    }
    await this.ensureRoot();
    this.logger.info("Initialized project", { path: this.localDir });
    return { path: this.localDir, created: true };
  }

  /**
   * Data directory of one version, created on first use. Idempotent.
   *
   * @returns `<project>/.clickhouse/<version>/`
   * @throws ProjectDataError PROJECT_IS_STORE when the root is the global store
   */
  async ensureProjectDir(version: Version): Promise<string> {
    await this.ensureRoot();
    const versionDir = join(this.localDir, formatVersion(version));
    await this.fileSystem.mkdir(versionDir);
    this.logger.debug("Project data dir ready", { path: versionDir });
    return versionDir;
  }

  private async ensureRoot(): Promise<void> {
    this.assertNotStore();
    await this.fileSystem.mkdir(this.localDir);
    const markerPath = join(this.localDir, GITIGNORE_NAME);
    // Never rewrite a marker the user may have edited
    if (!(await this.exists(markerPath))) {
      await this.fileSystem.writeFile(markerPath, GITIGNORE_CONTENT);
    }
  }

  // Running from the home directory makes `<cwd>/.clickhouse` the global store
  private assertNotStore(): void {
    if (resolve(this.localDir) === resolve(this.storeDir)) {
      throw new ProjectDataError(
        `Project data directory ${this.localDir} is the version store. ` +
          "Run chv from a project directory",
        "PROJECT_IS_STORE"
      );
    }
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await this.fileSystem.stat(path);
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Create a ProjectDataScoper instance.
 */
export function createProjectDataScoper(deps: ProjectDataScoperDeps): ProjectDataScoper {
  return new ProjectDataScoper(deps);
}
