/**
 * Installed-version store and default pointer.
 *
 * The filesystem is the only source of truth: every query re-reads the
 * store, nothing is cached between calls.
 */

import { join } from "node:path";
import { randomUUID } from "node:crypto";
import type { DirEntry, FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger } from "../logging/types.js";
import type { AppConfig } from "../config/types.js";
import { FileSystemError, VersionStoreError, getErrorMessage, isNotFoundError } from "../errors.js";
import type { RemoveOptions, Version } from "./types.js";
import { compareVersions, formatVersion, parseExactVersion } from "./version-spec.js";

/** Prefix of in-flight download files in the versions directory. */
export const STAGING_PREFIX = ".download-";

/** Prefix of version directories being deleted. */
export const REMOVING_PREFIX = ".removing-";

/**
 * Dependencies for VersionStore.
 */
export interface VersionStoreDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: Pick<
    PathProvider,
    "versionsDir" | "defaultFile" | "versionDir" | "binaryPath"
  >;
  readonly logger: Logger;
  readonly config: Pick<AppConfig, "orphanMaxAgeMs">;
  /** Clock for orphan age checks. Default: Date.now */
  readonly now?: () => number;
  /** Unique suffix for temp names. Default: crypto.randomUUID */
  readonly randomId?: () => string;
}

function notInstalled(version: Version): VersionStoreError {
  const formatted = formatVersion(version);
  return new VersionStoreError(
    `Version ${formatted} is not installed. Run: chv install ${formatted}`,
    "NOT_INSTALLED"
  );
}

/**
 * Storage layout manager for `<base>/versions/<exact>/clickhouse` and `<base>/default`.
 */
export class VersionStore {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: VersionStoreDeps["pathProvider"];
  private readonly logger: Logger;
  private readonly orphanMaxAgeMs: number;
  private readonly now: () => number;
  private readonly randomId: () => string;

  constructor(deps: VersionStoreDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
    this.orphanMaxAgeMs = deps.config.orphanMaxAgeMs;
    this.now = deps.now ?? Date.now;
    this.randomId = deps.randomId ?? randomUUID;
  }

  /**
   * Binary path of a version. No existence guarantee.
   */
  pathFor(version: Version): string {
    return this.pathProvider.binaryPath(formatVersion(version));
  }

  /**
   * True if `versions/<v>/clickhouse` exists as a regular file.
   */
  async isInstalled(version: Version): Promise<boolean> {
    try {
      const stat = await this.fileSystem.stat(this.pathFor(version));
      return stat.isFile;
    } catch (error) {
      // ENOTDIR: versions/<v> exists as a file
      if (
        error instanceof FileSystemError &&
        (error.fsCode === "ENOENT" || error.fsCode === "ENOTDIR")
      ) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Binary path of an installed version.
   *
   * @throws VersionStoreError with code NOT_INSTALLED
   */
  async requireInstalled(version: Version): Promise<string> {
    if (!(await this.isInstalled(version))) {
      throw notInstalled(version);
    }
    return this.pathFor(version);
  }

  /**
   * Installed versions, newest first. Directories that are not exact
   * versions or hold no binary are ignored.
   */
  async listInstalled(): Promise<readonly Version[]> {
    const entries = await this.readVersionsDir();
    const installed: Version[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory) continue;
      const version = parseExactVersion(entry.name);
      if (version && (await this.isInstalled(version))) {
        installed.push(version);
      }
    }
    this.logger.debug("Listed installed versions", { count: installed.length });
    return installed.sort((a, b) => compareVersions(b, a));
  }

  /**
   * Point the default at an installed version.
   * The pointer is written to a temp file and renamed into place.
   *
   * @throws VersionStoreError with code NOT_INSTALLED (prior pointer untouched)
   */
  async setDefault(version: Version): Promise<void> {
    await this.requireInstalled(version);

    const defaultFile = this.pathProvider.defaultFile;
    const tempFile = `${defaultFile}.${this.randomId()}.tmp`;
    try {
      await this.fileSystem.writeFile(tempFile, `${formatVersion(version)}\n`);
      await this.fileSystem.rename(tempFile, defaultFile);
    } catch (error) {
      await this.discard(tempFile);
      throw error;
    }
    this.logger.info("Default set", { version: formatVersion(version) });
  }

  /**
   * Current default version.
   *
   * @returns The version, or null when no pointer exists or it is blank
   * @throws VersionStoreError with code CORRUPT_DEFAULT when the pointer names
   *   something that is not an installed version
   */
  async getDefault(): Promise<Version | null> {
    const content = await this.readPointer();
    if (content === null) {
      return null;
    }
    const version = parseExactVersion(content);
    if (!version) {
      throw new VersionStoreError(
        `Default version file contains "${content}", which is not a version. Run: chv use <version>`,
        "CORRUPT_DEFAULT"
      );
    }
    if (!(await this.isInstalled(version))) {
      throw new VersionStoreError(
        `Default version ${content} is not installed. Run: chv install ${content} or chv use <version>`,
        "CORRUPT_DEFAULT"
      );
    }
    return version;
  }

  /**
   * Remove an installed version.
   * The directory is renamed out of the way first, then deleted.
   * A forced removal of the default leaves the pointer in place.
   *
   * @throws VersionStoreError with code NOT_INSTALLED or IN_USE_AS_DEFAULT
   */
  async remove(version: Version, options?: RemoveOptions): Promise<void> {
    const formatted = formatVersion(version);
    await this.requireInstalled(version);

    const pointer = await this.readPointer();
    const pointerVersion = pointer === null ? null : parseExactVersion(pointer);
    const isDefault = pointerVersion !== null && compareVersions(pointerVersion, version) === 0;
    if (isDefault && !options?.force) {
      throw new VersionStoreError(
        `Version ${formatted} is the default. Switch with chv use <version> first, or pass --force`,
        "IN_USE_AS_DEFAULT"
      );
    }

    const removingPath = join(
      this.pathProvider.versionsDir,
      `${REMOVING_PREFIX}${formatted}-${this.randomId()}`
    );
    await this.fileSystem.rename(this.pathProvider.versionDir(formatted), removingPath);
    await this.fileSystem.rm(removingPath, { recursive: true, force: true });
    this.logger.info("Removed version", { version: formatted, wasDefault: isDefault });
  }

  /**
   * Fresh staging path for a download, inside the versions directory so the
   * final rename stays on one filesystem.
   */
  async createStagingFile(version: Version): Promise<string> {
    await this.fileSystem.mkdir(this.pathProvider.versionsDir);
    return join(
      this.pathProvider.versionsDir,
      `${STAGING_PREFIX}${formatVersion(version)}-${this.randomId()}`
    );
  }

  /**
   * Mark a staged binary executable and move it to its final path.
   *
   * @returns The final binary path
   */
  async commitStagedBinary(stagingPath: string, version: Version): Promise<string> {
    const formatted = formatVersion(version);
    const binaryPath = this.pathFor(version);
    await this.fileSystem.makeExecutable(stagingPath);
    await this.fileSystem.mkdir(this.pathProvider.versionDir(formatted));
    await this.fileSystem.rename(stagingPath, binaryPath);
    this.logger.info("Installed binary", { version: formatted, path: binaryPath });
    return binaryPath;
  }

  /**
   * Delete a staging file left by a failed install. Failures are logged.
   */
  async discardStagingFile(stagingPath: string): Promise<void> {
    await this.discard(stagingPath);
  }

  /**
   * Delete staging files and removal leftovers older than the configured age.
   * Younger entries may belong to another running process and are kept.
   *
   * @returns Number of entries deleted
   */
  async sweepOrphans(): Promise<number> {
    const entries = await this.readVersionsDir();
    const cutoff = this.now() - this.orphanMaxAgeMs;
    let removed = 0;
    for (const entry of entries) {
      if (!entry.name.startsWith(STAGING_PREFIX) && !entry.name.startsWith(REMOVING_PREFIX)) {
        continue;
      }
      const entryPath = join(this.pathProvider.versionsDir, entry.name);
      try {
        const stat = await this.fileSystem.stat(entryPath);
        if (stat.mtimeMs > cutoff) continue;
        await this.fileSystem.rm(entryPath, { recursive: true, force: true });
        removed++;
      } catch (error) {
        // Another process may have cleaned it up first
        if (isNotFoundError(error)) continue;
        throw error;
      }
    }
    if (removed > 0) {
      this.logger.info("Swept orphaned entries", { removed });
    }
    return removed;
  }

  private async readVersionsDir(): Promise<readonly DirEntry[]> {
    try {
      return await this.fileSystem.readdir(this.pathProvider.versionsDir);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Trimmed pointer content, or null when absent or blank.
   */
  private async readPointer(): Promise<string | null> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(this.pathProvider.defaultFile);
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
    const trimmed = content.trim();
    return trimmed === "" ? null : trimmed;
  }

  private async discard(path: string): Promise<void> {
    try {
      await this.fileSystem.rm(path, { force: true });
    } catch (error) {
      this.logger.warn("Cleanup failed", { path, error: getErrorMessage(error) });
    }
  }
}

/**
 * Create a VersionStore instance.
 */
export function createVersionStore(deps: VersionStoreDeps): VersionStore {
  return new VersionStore(deps);
}
