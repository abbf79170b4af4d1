/**
 * Types for the remote release catalog.
 */

import type { Version } from "../version-manager/types.js";

/**
 * Release classification used for alias resolution.
 */
export type ReleaseChannel = "stable" | "lts" | "other";

/**
 * One published release.
 */
export interface ReleaseEntry {
  readonly version: Version;
  /** Tag as published, e.g. "v25.12.5.44-stable" */
  readonly tag: string;
  readonly channel: ReleaseChannel;
  readonly publishedAt: Date;
}

/**
 * Source of published releases.
 */
export interface ReleaseCatalog {
  /**
   * List published, non-draft releases in catalog order.
   *
   * @throws ReleaseCatalogError with code CATALOG_UNAVAILABLE
   */
  listReleases(signal?: AbortSignal): Promise<readonly ReleaseEntry[]>;
}
