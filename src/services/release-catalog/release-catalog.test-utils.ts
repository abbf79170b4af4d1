/**
 * Test utilities for the release catalog.
 */

import { vi, type Mock } from "vitest";
import { parseExactVersion } from "../version-manager/version-spec.js";
import type { ReleaseCatalog, ReleaseChannel, ReleaseEntry } from "./types.js";

const TAG_SUFFIX: Record<ReleaseChannel, string> = {
  stable: "-stable",
  lts: "-lts",
  other: "-testing",
};

/**
 * Create a ReleaseEntry from a version string.
 *
 * @example
 * createReleaseEntry("25.12.5.44", "stable")
 * // { version: [25, 12, 5, 44], tag: "v25.12.5.44-stable", channel: "stable", ... }
 */
export function createReleaseEntry(
  version: string,
  channel: ReleaseChannel = "stable",
  publishedAt: Date = new Date("2025-01-01T00:00:00Z")
): ReleaseEntry {
  const parsed = parseExactVersion(version);
  if (!parsed) {
    throw new Error(`Not an exact version: ${version}`);
  }
  return { version: parsed, tag: `v${version}${TAG_SUFFIX[channel]}`, channel, publishedAt };
}

/**
 * ReleaseCatalog with a vi.fn() listReleases.
 */
export interface MockReleaseCatalog extends ReleaseCatalog {
  listReleases: Mock<ReleaseCatalog["listReleases"]>;
}

/**
 * Create a mock ReleaseCatalog returning fixed entries or failing.
 *
 * @example
 * const catalog = createMockReleaseCatalog({
 *   entries: [createReleaseEntry("24.1.1.1", "lts")],
 * });
 */
export function createMockReleaseCatalog(options?: {
  entries?: readonly ReleaseEntry[];
  error?: Error;
}): MockReleaseCatalog {
  const error = options?.error;
  const entries = options?.entries ?? [];
  return {
    listReleases: vi.fn(async () => {
      if (error) throw error;
      return entries;
    }),
  };
}

/**
 * Raw release object as the GitHub API returns it.
 */
export function githubRelease(
  tag: string,
  options?: { publishedAt?: string | null; draft?: boolean }
): Record<string, unknown> {
  return {
    tag_name: tag,
    name: tag,
    published_at:
      options?.publishedAt === undefined ? "2025-01-01T00:00:00Z" : options.publishedAt,
    draft: options?.draft ?? false,
    prerelease: false,
  };
}
