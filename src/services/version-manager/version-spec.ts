/**
 * Version parsing, formatting and ordering.
 */

import { VersionResolutionError } from "../errors.js";
import type { Version, VersionPrefix, VersionSpec } from "./types.js";

const COMPONENT_PATTERN = /^\d+$/;

function parseComponents(value: string): number[] | null {
  const parts = value.split(".");
  const components: number[] = [];
  for (const part of parts) {
    if (!COMPONENT_PATTERN.test(part)) {
      return null;
    }
    const component = Number(part);
    if (!Number.isSafeInteger(component)) {
      return null;
    }
    components.push(component);
  }
  return components;
}

function toPrefix(components: readonly number[]): VersionPrefix | null {
  const [a, b, c] = components;
  if (a === undefined) return null;
  switch (components.length) {
    case 1:
      return [a];
    case 2:
      return b === undefined ? null : [a, b];
    case 3:
      return b === undefined || c === undefined ? null : [a, b, c];
    default:
      return null;
  }
}

function toVersion(components: readonly number[]): Version | null {
  const [a, b, c, d] = components;
  if (components.length !== 4 || a === undefined || b === undefined) return null;
  if (c === undefined || d === undefined) return null;
  return [a, b, c, d];
}

/**
 * Parse an exact version string such as "25.12.5.44".
 * No surrounding whitespace or prefix is accepted.
 *
 * @returns The version, or null when the string is not exactly four numeric components
 */
export function parseExactVersion(value: string): Version | null {
  const components = parseComponents(value);
  return components ? toVersion(components) : null;
}

/**
 * Parse a user-supplied version expression.
 *
 * Accepts `stable`, `lts` (any case), or one to four dot-separated numbers
 * with an optional leading `v`.
 *
 * @throws VersionResolutionError with code INVALID_VERSION_SPEC
 *
 * @example
 * parseVersionSpec("25.12")      // { kind: "partial", components: [25, 12] }
 * parseVersionSpec("v25.12.5.44") // { kind: "exact", version: [25, 12, 5, 44] }
 */
export function parseVersionSpec(input: string): VersionSpec {
  const trimmed = input.trim();
  const lower = trimmed.toLowerCase();
  if (lower === "stable") return { kind: "stable" };
  if (lower === "lts") return { kind: "lts" };

  const numeric = lower.startsWith("v") ? trimmed.slice(1) : trimmed;
  const components = numeric === "" ? null : parseComponents(numeric);
  if (components) {
    const version = toVersion(components);
    if (version) return { kind: "exact", version };
    const prefix = toPrefix(components);
    if (prefix) return { kind: "partial", components: prefix };
  }

  throw new VersionResolutionError(
    `Invalid version spec "${input}": expected stable, lts, or a version like 25.12 or 25.12.5.44`,
    "INVALID_VERSION_SPEC"
  );
}

/**
 * Format a version as "a.b.c.d".
 */
export function formatVersion(version: Version): string {
  return version.join(".");
}

/**
 * Format a spec back to the canonical user-facing form.
 */
export function formatVersionSpec(spec: VersionSpec): string {
  switch (spec.kind) {
    case "stable":
    case "lts":
      return spec.kind;
    case "partial":
      return spec.components.join(".");
    case "exact":
      return formatVersion(spec.version);
  }
}

/**
 * Numeric component-wise ordering.
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareVersions(a: Version, b: Version): number {
  for (let i = 0; i < 4; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * True if the version's leading components equal the prefix.
 */
export function matchesPrefix(version: Version, prefix: VersionPrefix): boolean {
  return prefix.every((component, index) => version[index] === component);
}
