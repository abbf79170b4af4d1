/**
 * Service error definitions with JSON serialization for `--json` output.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Error codes for release catalog operations.
 */
export type ReleaseCatalogErrorCode = "CATALOG_UNAVAILABLE";

/**
 * Error codes for version spec parsing and resolution.
 */
export type VersionResolutionErrorCode = "INVALID_VERSION_SPEC" | "NO_MATCHING_VERSION";

/**
 * Error codes for binary download operations.
 */
export type BinaryDownloadErrorCode =
  | "UNSUPPORTED_PLATFORM"
  | "DOWNLOAD_FAILED"
  | "INSUFFICIENT_STORAGE";

/**
 * Error codes for the installed-version store.
 */
export type VersionStoreErrorCode =
  | "NOT_INSTALLED"
  | "NO_DEFAULT_SET"
  | "IN_USE_AS_DEFAULT"
  | "CORRUPT_DEFAULT";

/**
 * Error codes for project data directories.
 */
export type ProjectDataErrorCode = "PROJECT_IS_STORE";

/**
 * Error codes for configuration loading.
 */
export type ConfigErrorCode = "INVALID_CONFIG";

/**
 * Serialized error format.
 */
export interface SerializedError {
  readonly type:
    | "release-catalog"
    | "version-resolution"
    | "binary-download"
    | "version-store"
    | "project-data"
    | "filesystem"
    | "config";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error for machine-readable output.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * The remote release listing could not be fetched or understood.
 */
export class ReleaseCatalogError extends ServiceError {
  readonly type = "release-catalog" as const;

  constructor(
    message: string,
    readonly errorCode: ReleaseCatalogErrorCode = "CATALOG_UNAVAILABLE"
  ) {
    super(message, errorCode);
    this.name = "ReleaseCatalogError";
  }
}

/**
 * A version expression was malformed or matched no published release.
 */
export class VersionResolutionError extends ServiceError {
  readonly type = "version-resolution" as const;

  constructor(
    message: string,
    readonly errorCode: VersionResolutionErrorCode
  ) {
    super(message, errorCode);
    this.name = "VersionResolutionError";
  }
}

/**
 * Error from binary download operations.
 */
export class BinaryDownloadError extends ServiceError {
  readonly type = "binary-download" as const;

  constructor(
    message: string,
    readonly errorCode: BinaryDownloadErrorCode
  ) {
    super(message, errorCode);
    this.name = "BinaryDownloadError";
  }
}

/**
 * Error from the installed-version store or the default pointer.
 */
export class VersionStoreError extends ServiceError {
  readonly type = "version-store" as const;

  constructor(
    message: string,
    readonly errorCode: VersionStoreErrorCode
  ) {
    super(message, errorCode);
    this.name = "VersionStoreError";
  }
}

/**
 * Error from project data directories.
 */
export class ProjectDataError extends ServiceError {
  readonly type = "project-data" as const;

  constructor(
    message: string,
    readonly errorCode: ProjectDataErrorCode
  ) {
    super(message, errorCode);
    this.name = "ProjectDataError";
  }
}

/**
 * Invalid configuration file or environment override.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(
    message: string,
    readonly errorCode: ConfigErrorCode = "INVALID_CONFIG"
  ) {
    super(message, errorCode);
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Type guard for a filesystem "not found" error.
 */
export function isNotFoundError(error: unknown): error is FileSystemError {
  return error instanceof FileSystemError && error.fsCode === "ENOENT";
}

export { getErrorMessage } from "../shared/error-utils.js";
