/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { FileSystemError } from "../errors.js";
import type { Logger } from "../logging/types.js";
import { SILENT_LOGGER } from "../logging/index.js";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory */
  readonly isDirectory: boolean;
  /** True if entry is a regular file */
  readonly isFile: boolean;
  /** True if entry is a symbolic link */
  readonly isSymbolicLink: boolean;
}

/**
 * Metadata returned by stat. Symlinks are followed.
 */
export interface FileStat {
  readonly isFile: boolean;
  readonly isDirectory: boolean;
  /** Size in bytes */
  readonly size: number;
  /** Last modification time (ms since epoch) */
  readonly mtimeMs: number;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "ENOSPC" // No space left on device
  | "EDQUOT" // Disk quota exceeded
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute strings.
 * All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations to avoid TOCTOU races.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   *
   * @example
   * const content = await fs.readFile('/home/user/.clickhouse/default');
   */
  readFile(path: string): Promise<string>;

  /**
   * Write content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Write a stream of chunks to a file, creating or truncating it.
   * Resolves once every chunk has been flushed. A failure in the source
   * iterable rejects with that error unchanged.
   *
   * @throws FileSystemError on write failures (ENOSPC, EDQUOT, EACCES, ...)
   *
   * @example
   * await fs.writeFileStream('/tmp/.download-x', response.body);
   */
  writeFileStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<void>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   *
   * @example
   * const entries = await fs.readdir('/home/user/.clickhouse/versions');
   * const versions = entries.filter(e => e.isDirectory);
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Read file metadata.
   *
   * @throws FileSystemError with code ENOENT if path not found
   */
  stat(path: string): Promise<FileStat>;

  /**
   * Delete file or directory.
   *
   * @param options.recursive - If true, remove directory contents (default: false)
   * @param options.force - If true, ignore ENOENT errors (default: false)
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code ENOTEMPTY if directory not empty (unless recursive: true)
   *
   * @example Remove if exists (no error if missing)
   * await fs.rm('/path/to/maybe', { force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Make a file executable (sets mode 0o755).
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  makeExecutable(path: string): Promise<void>;

  /**
   * Rename (move) a file or directory atomically.
   * This is the standard pattern for atomic file writes:
   * 1. Write to a temp file
   * 2. Rename temp file to target (atomic on the same filesystem)
   *
   * @throws FileSystemError with code ENOENT if oldPath doesn't exist
   *
   * @example Atomic write pattern
   * await fs.writeFile('/path/to/file.tmp', content);
   * await fs.rename('/path/to/file.tmp', '/path/to/file');
   */
  rename(oldPath: string, newPath: string): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
  "ENOSPC",
  "EDQUOT",
]);

function isKnownErrorCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return KNOWN_ERROR_CODES.has(code);
}

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return typeof property === "string" ? property : undefined;
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() raises SystemErrors with ERR_FS_* codes whose `info.code` holds the POSIX code.
 */
function extractErrorCode(error: Error): string | undefined {
  const info: unknown = "info" in error ? error.info : undefined;
  return readStringProperty(info, "code") ?? readStringProperty(error, "code");
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (error instanceof FileSystemError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

function isEnoent(error: unknown): boolean {
  return error instanceof Error && extractErrorCode(error) === "ENOENT";
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger = SILENT_LOGGER) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.fail("Read failed", error, filePath);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Write", { path: filePath });
    try {
      await fs.writeFile(filePath, content, "utf-8");
    } catch (error) {
      throw this.fail("Write failed", error, filePath);
    }
  }

  async writeFileStream(filePath: string, chunks: AsyncIterable<Uint8Array>): Promise<void> {
    this.logger.debug("WriteStream", { path: filePath });
    let sourceFailed = false;
    let sourceError: unknown;
    async function* tracked(): AsyncGenerator<Uint8Array> {
      try {
        for await (const chunk of chunks) {
          yield chunk;
        }
      } catch (error) {
        sourceFailed = true;
        sourceError = error;
        throw error;
      }
    }
    try {
      await pipeline(Readable.from(tracked()), createWriteStream(filePath));
    } catch (error) {
      // Errors raised by the source pass through untouched
      if (sourceFailed) {
        throw sourceError;
      }
      throw this.fail("WriteStream failed", error, filePath);
    }
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir failed", error, dirPath);
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
        isSymbolicLink: entry.isSymbolicLink(),
      }));
      this.logger.debug("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      throw this.fail("Readdir failed", error, dirPath);
    }
  }

  async stat(targetPath: string): Promise<FileStat> {
    try {
      const stats = await fs.stat(targetPath);
      return {
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        size: stats.size,
        mtimeMs: stats.mtimeMs,
      };
    } catch (error) {
      // Missing paths are routine probes; keep them out of the warn log
      const fsError = mapError(error, targetPath);
      if (fsError.fsCode !== "ENOENT") {
        this.logWarn("Stat failed", targetPath, fsError);
      }
      throw fsError;
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
      } else {
        const stat = await fs.stat(targetPath);
        if (stat.isDirectory()) {
          // rmdir fails with ENOTEMPTY if not empty
          await fs.rmdir(targetPath);
        } else {
          await fs.rm(targetPath, { force });
        }
      }
    } catch (error) {
      if (force && isEnoent(error)) {
        return;
      }
      throw this.fail("Rm failed", error, targetPath);
    }
  }

  async makeExecutable(filePath: string): Promise<void> {
    this.logger.debug("Chmod", { path: filePath, mode: "755" });
    try {
      await fs.chmod(filePath, 0o755);
    } catch (error) {
      throw this.fail("Chmod failed", error, filePath);
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    this.logger.debug("Rename", { oldPath, newPath });
    try {
      await fs.rename(oldPath, newPath);
    } catch (error) {
      const fsError = mapError(error, oldPath);
      this.logger.warn("Rename failed", {
        oldPath,
        newPath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  private fail(message: string, error: unknown, path: string): FileSystemError {
    const fsError = mapError(error, path);
    this.logWarn(message, path, fsError);
    return fsError;
  }

  private logWarn(message: string, path: string, fsError: FileSystemError): void {
    this.logger.warn(message, {
      path,
      code: fsError.fsCode,
      error: fsError.message,
    });
  }
}
