/**
 * Types for version specs, installed versions and installs.
 */

import type { ReleaseChannel } from "../release-catalog/types.js";

/**
 * Exact four-component version, e.g. [25, 12, 5, 44].
 */
export type Version = readonly [number, number, number, number];

/**
 * Leading components of a version: [25], [25, 12] or [25, 12, 5].
 */
export type VersionPrefix =
  | readonly [number]
  | readonly [number, number]
  | readonly [number, number, number];

/**
 * Parsed version expression. Produced once by parseVersionSpec.
 */
export type VersionSpec =
  | { readonly kind: "stable" }
  | { readonly kind: "lts" }
  | { readonly kind: "partial"; readonly components: VersionPrefix }
  | { readonly kind: "exact"; readonly version: Version };

/**
 * Progress information for binary downloads.
 */
export interface DownloadProgress {
  /** Number of bytes downloaded so far */
  readonly bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  readonly totalBytes: number | null;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;

/**
 * Options for Installer.install.
 */
export interface InstallOptions {
  readonly onProgress?: DownloadProgressCallback;
  /** Cancels the catalog request and the download */
  readonly signal?: AbortSignal;
}

/**
 * Outcome of an install.
 */
export interface InstallResult {
  readonly version: Version;
  /** Release tag, or null when an installed exact version short-circuited the catalog */
  readonly tag: string | null;
  readonly channel: ReleaseChannel | null;
  readonly binaryPath: string;
  readonly alreadyInstalled: boolean;
}

/**
 * Options for VersionStore.remove.
 */
export interface RemoveOptions {
  /** Remove even when the version is the current default */
  readonly force?: boolean;
}
