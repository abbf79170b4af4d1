/**
 * Version spec resolution against a release catalog or the installed set.
 * Pure functions, no I/O.
 */

import { VersionResolutionError } from "../errors.js";
import type { ReleaseEntry } from "../release-catalog/types.js";
import type { Version, VersionPrefix, VersionSpec } from "./types.js";
import { compareVersions, formatVersionSpec, matchesPrefix } from "./version-spec.js";

/**
 * Ordering for releases: higher version first, then newer publish time.
 * Equal entries keep their relative order under a stable sort.
 */
function compareReleasesDescending(a: ReleaseEntry, b: ReleaseEntry): number {
  const byVersion = compareVersions(b.version, a.version);
  if (byVersion !== 0) return byVersion;
  return b.publishedAt.getTime() - a.publishedAt.getTime();
}

function pickHighest(entries: Iterable<ReleaseEntry>): ReleaseEntry | undefined {
  let best: ReleaseEntry | undefined;
  for (const entry of entries) {
    // Strictly better only, so earlier catalog position wins remaining ties
    if (best === undefined || compareReleasesDescending(entry, best) < 0) {
      best = entry;
    }
  }
  return best;
}

function noMatch(spec: VersionSpec): VersionResolutionError {
  return new VersionResolutionError(
    `No release matches "${formatVersionSpec(spec)}". Run "chv list --remote" to see available versions`,
    "NO_MATCHING_VERSION"
  );
}

/**
 * Resolve a spec to one catalog entry.
 *
 * - exact: first entry with that version
 * - stable / lts: highest entry of that channel
 * - partial: highest entry whose leading components match, any channel
 *
 * @throws VersionResolutionError with code NO_MATCHING_VERSION
 */
export function resolveRelease(spec: VersionSpec, catalog: readonly ReleaseEntry[]): ReleaseEntry {
  let match: ReleaseEntry | undefined;
  switch (spec.kind) {
    case "exact":
      match = catalog.find((entry) => compareVersions(entry.version, spec.version) === 0);
      break;
    case "stable":
    case "lts":
      match = pickHighest(catalog.filter((entry) => entry.channel === spec.kind));
      break;
    case "partial":
      match = pickHighest(catalog.filter((entry) => matchesPrefix(entry.version, spec.components)));
      break;
  }
  if (match === undefined) {
    throw noMatch(spec);
  }
  return match;
}

/**
 * Copy of the catalog ordered newest first.
 */
export function sortReleasesDescending(catalog: readonly ReleaseEntry[]): ReleaseEntry[] {
  return [...catalog].sort(compareReleasesDescending);
}

/**
 * Highest installed version matching a prefix.
 *
 * @returns The version, or null when nothing installed matches
 */
export function resolveInstalled(
  prefix: VersionPrefix,
  installed: readonly Version[]
): Version | null {
  let best: Version | null = null;
  for (const version of installed) {
    if (matchesPrefix(version, prefix) && (best === null || compareVersions(version, best) > 0)) {
      best = version;
    }
  }
  return best;
}
