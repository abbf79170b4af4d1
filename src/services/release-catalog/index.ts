/**
 * Release catalog module.
 */

export type { ReleaseCatalog, ReleaseChannel, ReleaseEntry } from "./types.js";
export {
  GitHubReleaseCatalog,
  createReleaseCatalog,
  parseReleaseTag,
  hasNextPage,
  type GitHubReleaseCatalogDeps,
} from "./github-release-catalog.js";
