/**
 * Test utilities for FileSystemLayer mocking.
 *
 * Provides mock factory for FileSystemLayer to enable easy unit testing of consumers.
 */

import { vi, type Mock } from "vitest";
import type {
  FileSystemLayer,
  FileSystemErrorCode,
  DirEntry,
  FileStat,
  MkdirOptions,
  RmOptions,
} from "./filesystem.js";
import { FileSystemError } from "../errors.js";

// ============================================================================
// Mock Option Types
// ============================================================================

/**
 * Behavior of a single mocked method: a fixed result, a thrown error,
 * or a custom implementation (which wins over both).
 */
export interface MockMethodOptions<TArgs extends unknown[], TResult> {
  readonly result?: TResult;
  readonly error?: Error;
  readonly implementation?: (...args: TArgs) => Promise<TResult>;
}

/**
 * Options for creating a mock FileSystemLayer.
 */
export interface MockFileSystemLayerOptions {
  readonly readFile?: MockMethodOptions<[path: string], string>;
  readonly writeFile?: MockMethodOptions<[path: string, content: string], void>;
  readonly writeFileStream?: MockMethodOptions<
    [path: string, chunks: AsyncIterable<Uint8Array>],
    void
  >;
  readonly mkdir?: MockMethodOptions<[path: string, options?: MkdirOptions], void>;
  readonly readdir?: MockMethodOptions<[path: string], readonly DirEntry[]>;
  readonly stat?: MockMethodOptions<[path: string], FileStat>;
  readonly rm?: MockMethodOptions<[path: string, options?: RmOptions], void>;
  readonly makeExecutable?: MockMethodOptions<[path: string], void>;
  readonly rename?: MockMethodOptions<[oldPath: string, newPath: string], void>;
}

function mockMethod<TArgs extends unknown[], TResult>(
  options: MockMethodOptions<TArgs, TResult> | undefined,
  fallback: (...args: TArgs) => Promise<TResult>
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    if (options?.implementation) {
      return options.implementation(...args);
    }
    if (options?.error) {
      throw options.error;
    }
    if (options?.result !== undefined) {
      return options.result;
    }
    return fallback(...args);
  };
}

// ============================================================================
// Mock FileSystemLayer Factory
// ============================================================================

/**
 * Create mock FileSystemLayer for testing.
 * By default every write succeeds, readdir returns [], and reads/stat throw ENOENT.
 *
 * @example Return specific file content
 * const mockFs = createMockFileSystemLayer({
 *   readFile: { result: '25.12.5.44\n' }
 * });
 *
 * @example Throw specific error
 * const mockFs = createMockFileSystemLayer({
 *   writeFileStream: { error: createFileSystemError('ENOSPC', '/x') }
 * });
 */
export function createMockFileSystemLayer(options?: MockFileSystemLayerOptions): FileSystemLayer {
  const notFound = async (path: string): Promise<never> => {
    throw createFileSystemError("ENOENT", path);
  };
  const succeed = async (): Promise<void> => {};

  return {
    readFile: mockMethod(options?.readFile, notFound),
    writeFile: mockMethod(options?.writeFile, succeed),
    writeFileStream: mockMethod(options?.writeFileStream, async (_path, chunks) => {
      // Drain the source so producer errors surface like the real layer
      for await (const chunk of chunks) {
        void chunk;
      }
    }),
    mkdir: mockMethod(options?.mkdir, succeed),
    readdir: mockMethod(options?.readdir, async () => []),
    stat: mockMethod(options?.stat, notFound),
    rm: mockMethod(options?.rm, succeed),
    makeExecutable: mockMethod(options?.makeExecutable, succeed),
    rename: mockMethod(options?.rename, succeed),
  };
}

// ============================================================================
// Spy FileSystemLayer Factory
// ============================================================================

/**
 * FileSystemLayer with vi.fn() spies for asserting on method calls.
 */
export interface SpyFileSystemLayer extends FileSystemLayer {
  readFile: Mock<FileSystemLayer["readFile"]>;
  writeFile: Mock<FileSystemLayer["writeFile"]>;
  writeFileStream: Mock<FileSystemLayer["writeFileStream"]>;
  mkdir: Mock<FileSystemLayer["mkdir"]>;
  readdir: Mock<FileSystemLayer["readdir"]>;
  stat: Mock<FileSystemLayer["stat"]>;
  rm: Mock<FileSystemLayer["rm"]>;
  makeExecutable: Mock<FileSystemLayer["makeExecutable"]>;
  rename: Mock<FileSystemLayer["rename"]>;
}

/**
 * Create a FileSystemLayer with vi.fn() spies, wrapping either the mock
 * behaviour or a real layer passed as `base`.
 *
 * @example Assert on calls against a real temp dir
 * ```typescript
 * const fs = createSpyFileSystemLayer(undefined, new DefaultFileSystemLayer());
 * await store.setDefault("25.12.5.44");
 * expect(fs.rename).toHaveBeenCalled();
 * ```
 */
export function createSpyFileSystemLayer(
  options?: MockFileSystemLayerOptions,
  base: FileSystemLayer = createMockFileSystemLayer(options)
): SpyFileSystemLayer {
  return {
    readFile: vi.fn((path: string) => base.readFile(path)),
    writeFile: vi.fn((path: string, content: string) => base.writeFile(path, content)),
    writeFileStream: vi.fn((path: string, chunks: AsyncIterable<Uint8Array>) =>
      base.writeFileStream(path, chunks)
    ),
    mkdir: vi.fn((path: string, mkdirOptions?: MkdirOptions) => base.mkdir(path, mkdirOptions)),
    readdir: vi.fn((path: string) => base.readdir(path)),
    stat: vi.fn((path: string) => base.stat(path)),
    rm: vi.fn((path: string, rmOptions?: RmOptions) => base.rm(path, rmOptions)),
    makeExecutable: vi.fn((path: string) => base.makeExecutable(path)),
    rename: vi.fn((oldPath: string, newPath: string) => base.rename(oldPath, newPath)),
  };
}

// ============================================================================
// Helper Functions for Creating Common Test Scenarios
// ============================================================================

/**
 * Create a FileSystemError as the real layer would raise it.
 */
export function createFileSystemError(code: FileSystemErrorCode, path: string): FileSystemError {
  return new FileSystemError(code, path, `${code}: ${path}`);
}

/**
 * Create a DirEntry for testing.
 *
 * @example Directory entry
 * createDirEntry('25.12.5.44', { isDirectory: true })
 */
export function createDirEntry(
  name: string,
  options?: {
    isDirectory?: boolean;
    isFile?: boolean;
    isSymbolicLink?: boolean;
  }
): DirEntry {
  return {
    name,
    isDirectory: options?.isDirectory ?? false,
    // isFile defaults to true only when both isDirectory and isSymbolicLink are falsy
    isFile: options?.isFile ?? (!options?.isDirectory && !options?.isSymbolicLink),
    isSymbolicLink: options?.isSymbolicLink ?? false,
  };
}
