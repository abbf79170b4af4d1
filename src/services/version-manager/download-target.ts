/**
 * Platform to release-asset mapping.
 */

import type { PlatformInfo } from "../platform/platform-info.js";
import { BinaryDownloadError } from "../errors.js";

/**
 * Operating system and architecture names as used in release asset names.
 */
export interface DownloadTarget {
  readonly os: "macos" | "linux";
  readonly arch: "x86_64" | "aarch64";
}

const OS_NAMES: Partial<Record<NodeJS.Platform, DownloadTarget["os"]>> = {
  darwin: "macos",
  linux: "linux",
};

const ARCH_NAMES: Partial<Record<NodeJS.Architecture, DownloadTarget["arch"]>> = {
  x64: "x86_64",
  arm64: "aarch64",
};

/**
 * Map the running platform to a download target.
 *
 * @throws BinaryDownloadError with code UNSUPPORTED_PLATFORM
 */
export function resolveDownloadTarget(
  platformInfo: Pick<PlatformInfo, "platform" | "arch">
): DownloadTarget {
  const os = OS_NAMES[platformInfo.platform];
  const arch = ARCH_NAMES[platformInfo.arch];
  if (!os || !arch) {
    throw new BinaryDownloadError(
      `Unsupported platform: ${platformInfo.platform}-${platformInfo.arch}. Supported: darwin or linux on x64 or arm64`,
      "UNSUPPORTED_PLATFORM"
    );
  }
  return { os, arch };
}

/**
 * Download URL of the single-file binary for a release tag.
 *
 * @example
 * buildDownloadUrl(base, "v25.12.5.44-stable", { os: "linux", arch: "x86_64" })
 * // `${base}/v25.12.5.44-stable/clickhouse-linux-x86_64`
 */
export function buildDownloadUrl(baseUrl: string, tag: string, target: DownloadTarget): string {
  return `${baseUrl}/${encodeURIComponent(tag)}/clickhouse-${target.os}-${target.arch}`;
}
