/**
 * Installer: resolve a spec, download the binary, place it in the store.
 */

import type { HttpClient } from "../platform/network.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { Logger } from "../logging/types.js";
import type { AppConfig } from "../config/types.js";
import type { ReleaseCatalog } from "../release-catalog/types.js";
import { BinaryDownloadError, FileSystemError, getErrorMessage } from "../errors.js";
import { buildDownloadUrl, resolveDownloadTarget } from "./download-target.js";
import { resolveRelease } from "./resolver.js";
import type { VersionStore } from "./version-store.js";
import type {
  DownloadProgressCallback,
  InstallOptions,
  InstallResult,
  VersionSpec,
} from "./types.js";
import { formatVersion, formatVersionSpec } from "./version-spec.js";

/**
 * Dependencies for Installer.
 */
export interface InstallerDeps {
  readonly catalog: ReleaseCatalog;
  readonly store: VersionStore;
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly platformInfo: Pick<PlatformInfo, "platform" | "arch">;
  readonly config: Pick<AppConfig, "downloadBaseUrl" | "downloadTimeoutMs">;
  readonly logger: Logger;
}

function parseContentLength(value: string | null): number | null {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return Number(value.trim());
}

function isOutOfSpace(error: unknown): error is FileSystemError {
  return (
    error instanceof FileSystemError && (error.fsCode === "ENOSPC" || error.fsCode === "EDQUOT")
  );
}

/**
 * Installs releases into the version store.
 *
 * Downloads stream into a staging file next to the final location and are
 * renamed into place only once complete, so an interrupted install never
 * leaves a partial binary at `versions/<v>/clickhouse`.
 */
export class Installer {
  private readonly catalog: ReleaseCatalog;
  private readonly store: VersionStore;
  private readonly httpClient: HttpClient;
  private readonly fileSystem: FileSystemLayer;
  private readonly platformInfo: InstallerDeps["platformInfo"];
  private readonly config: InstallerDeps["config"];
  private readonly logger: Logger;

  constructor(deps: InstallerDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.httpClient = deps.httpClient;
    this.fileSystem = deps.fileSystem;
    this.platformInfo = deps.platformInfo;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /**
   * Install the release a spec resolves to.
   * An exact spec that is already installed returns without network access.
   *
   * @throws BinaryDownloadError UNSUPPORTED_PLATFORM before any network call
   * @throws ReleaseCatalogError, VersionResolutionError from resolution
   * @throws BinaryDownloadError DOWNLOAD_FAILED or INSUFFICIENT_STORAGE
   */
  async install(spec: VersionSpec, options?: InstallOptions): Promise<InstallResult> {
    const target = resolveDownloadTarget(this.platformInfo);
    await this.store.sweepOrphans();

    if (spec.kind === "exact" && (await this.store.isInstalled(spec.version))) {
      this.logger.info("Already installed", { version: formatVersion(spec.version) });
      return {
        version: spec.version,
        tag: null,
        channel: null,
        binaryPath: this.store.pathFor(spec.version),
        alreadyInstalled: true,
      };
    }

    const releases = await this.catalog.listReleases(options?.signal);
    const release = resolveRelease(spec, releases);
    const version = formatVersion(release.version);
    this.logger.info("Resolved", { spec: formatVersionSpec(spec), version, tag: release.tag });

    if (await this.store.isInstalled(release.version)) {
      return {
        version: release.version,
        tag: release.tag,
        channel: release.channel,
        binaryPath: this.store.pathFor(release.version),
        alreadyInstalled: true,
      };
    }

    const url = buildDownloadUrl(this.config.downloadBaseUrl, release.tag, target);
    const stagingPath = await this.store.createStagingFile(release.version);
    this.logger.info("Downloading", { version, url });

    let binaryPath: string;
    try {
      await this.download(url, stagingPath, options);
      binaryPath = await this.store.commitStagedBinary(stagingPath, release.version);
    } catch (error) {
      this.logger.warn("Install failed", { version, error: getErrorMessage(error) });
      await this.store.discardStagingFile(stagingPath);
      throw error;
    }

    return {
      version: release.version,
      tag: release.tag,
      channel: release.channel,
      binaryPath,
      alreadyInstalled: false,
    };
  }

  private async download(
    url: string,
    destPath: string,
    options: InstallOptions | undefined
  ): Promise<void> {
    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: this.config.downloadTimeoutMs,
        ...(options?.signal ? { signal: options.signal } : {}),
      });
    } catch (error) {
      throw new BinaryDownloadError(
        `Network error downloading ${url}: ${getErrorMessage(error)}`,
        "DOWNLOAD_FAILED"
      );
    }

    if (!response.ok) {
      throw new BinaryDownloadError(
        `HTTP ${response.status} downloading ${url}`,
        "DOWNLOAD_FAILED"
      );
    }
    if (!response.body) {
      throw new BinaryDownloadError(`Empty response downloading ${url}`, "DOWNLOAD_FAILED");
    }

    const totalBytes = parseContentLength(response.headers.get("content-length"));
    const progress = { bytesDownloaded: 0 };
    const chunks = this.readChunks(response.body, totalBytes, progress, options);

    try {
      await this.fileSystem.writeFileStream(destPath, chunks);
    } catch (error) {
      if (error instanceof BinaryDownloadError) {
        throw error;
      }
      if (isOutOfSpace(error)) {
        throw new BinaryDownloadError(
          `Not enough disk space to install into ${destPath}`,
          "INSUFFICIENT_STORAGE"
        );
      }
      if (error instanceof FileSystemError) {
        throw error;
      }
      throw new BinaryDownloadError(
        `Download interrupted: ${getErrorMessage(error)}`,
        "DOWNLOAD_FAILED"
      );
    }

    if (totalBytes !== null && progress.bytesDownloaded !== totalBytes) {
      throw new BinaryDownloadError(
        `Download incomplete: received ${progress.bytesDownloaded} of ${totalBytes} bytes`,
        "DOWNLOAD_FAILED"
      );
    }
    this.logger.debug("Download complete", { url, bytes: progress.bytesDownloaded });
  }

  private async *readChunks(
    body: ReadableStream<Uint8Array>,
    totalBytes: number | null,
    progress: { bytesDownloaded: number },
    options: InstallOptions | undefined
  ): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    let settled = false;
    try {
      while (true) {
        if (options?.signal?.aborted) {
          throw new BinaryDownloadError("Download cancelled", "DOWNLOAD_FAILED");
        }
        const result = await reader.read().catch((error: unknown) => {
          settled = true;
          if (options?.signal?.aborted) {
            throw new BinaryDownloadError("Download cancelled", "DOWNLOAD_FAILED");
          }
          throw error;
        });
        if (result.done) {
          settled = true;
          break;
        }
        progress.bytesDownloaded += result.value.byteLength;
        this.reportProgress(options?.onProgress, progress.bytesDownloaded, totalBytes);
        yield result.value;
      }
    } finally {
      // Stopped early (cancelled or write failure): release the connection
      if (!settled) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  private reportProgress(
    onProgress: DownloadProgressCallback | undefined,
    bytesDownloaded: number,
    totalBytes: number | null
  ): void {
    if (!onProgress) return;
    try {
      onProgress({ bytesDownloaded, totalBytes });
    } catch (error) {
      this.logger.warn("Progress callback failed", { error: getErrorMessage(error) });
    }
  }
}

/**
 * Create an Installer instance.
 */
export function createInstaller(deps: InstallerDeps): Installer {
  return new Installer(deps);
}
