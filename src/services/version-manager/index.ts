/**
 * Version manager module: spec parsing, resolution, store and installer.
 */

export type {
  Version,
  VersionPrefix,
  VersionSpec,
  DownloadProgress,
  DownloadProgressCallback,
  InstallOptions,
  InstallResult,
  RemoveOptions,
} from "./types.js";
export {
  parseVersionSpec,
  parseExactVersion,
  formatVersion,
  formatVersionSpec,
  compareVersions,
  matchesPrefix,
} from "./version-spec.js";
export { resolveRelease, resolveInstalled, sortReleasesDescending } from "./resolver.js";
export {
  VersionStore,
  createVersionStore,
  STAGING_PREFIX,
  REMOVING_PREFIX,
  type VersionStoreDeps,
} from "./version-store.js";
export { Installer, createInstaller, type InstallerDeps } from "./installer.js";
export { resolveDownloadTarget, buildDownloadUrl, type DownloadTarget } from "./download-target.js";
