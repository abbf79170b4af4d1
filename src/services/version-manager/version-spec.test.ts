/**
 * Unit tests for version parsing, formatting and ordering.
 */

import { describe, it, expect } from "vitest";
import {
  compareVersions,
  formatVersion,
  formatVersionSpec,
  matchesPrefix,
  parseExactVersion,
  parseVersionSpec,
} from "./version-spec.js";
import { VersionResolutionError } from "../errors.js";
import { v } from "./version-manager.test-utils.js";

describe("parseVersionSpec", () => {
  it.each([
    ["stable", { kind: "stable" }],
    ["LTS", { kind: "lts" }],
    ["  Stable\n", { kind: "stable" }],
    ["25", { kind: "partial", components: [25] }],
    ["25.12", { kind: "partial", components: [25, 12] }],
    ["25.12.5", { kind: "partial", components: [25, 12, 5] }],
    ["25.12.5.44", { kind: "exact", version: [25, 12, 5, 44] }],
    ["v25.12.5.44", { kind: "exact", version: [25, 12, 5, 44] }],
    ["v24.8", { kind: "partial", components: [24, 8] }],
  ] as const)("parses %j", (input, expected) => {
    expect(parseVersionSpec(input)).toEqual(expected);
  });

  it.each([
    "",
    "latest",
    "25.",
    ".12",
    "25..1",
    "25.12.5.44.1",
    "25.x",
    "vv25",
    "v",
    "-1",
    "25.12-stable",
  ])("rejects %j", (input) => {
    expect(() => parseVersionSpec(input)).toThrow(VersionResolutionError);
  });

  it("reports INVALID_VERSION_SPEC with the input", () => {
    let caught: unknown;
    try {
      parseVersionSpec("latest");
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: "INVALID_VERSION_SPEC",
      message:
        'Invalid version spec "latest": expected stable, lts, or a version like 25.12 or 25.12.5.44',
    });
  });
});

describe("parseExactVersion", () => {
  it("parses four numeric components", () => {
    expect(parseExactVersion("24.8.10.6")).toEqual([24, 8, 10, 6]);
  });

  it.each(["24.8.10", "v24.8.10.6", " 24.8.10.6", "24.8.10.6-lts", ".removing-24.8.10.6"])(
    "returns null for %j",
    (input) => {
      expect(parseExactVersion(input)).toBeNull();
    }
  );
});

describe("formatVersion", () => {
  it("joins components with dots", () => {
    expect(formatVersion([25, 12, 5, 44])).toBe("25.12.5.44");
  });
});

describe("formatVersionSpec", () => {
  it.each(["stable", "lts", "25", "25.12", "25.12.5", "25.12.5.44"])("round-trips %s", (input) => {
    expect(formatVersionSpec(parseVersionSpec(input))).toBe(input);
  });
});

describe("compareVersions", () => {
  it("orders numerically, not lexically", () => {
    expect(compareVersions(v("25.12.0.0"), v("9.1.0.0"))).toBeGreaterThan(0);
    expect(compareVersions(v("25.2.0.0"), v("25.12.0.0"))).toBeLessThan(0);
  });

  it("compares later components when earlier ones are equal", () => {
    expect(compareVersions(v("25.12.5.44"), v("25.12.5.9"))).toBeGreaterThan(0);
  });

  it("returns 0 for equal versions", () => {
    expect(compareVersions(v("25.12.5.44"), v("25.12.5.44"))).toBe(0);
  });

  it("sorts a list newest first", () => {
    const sorted = [v("9.1.0.0"), v("25.12.5.44"), v("25.2.1.1")].sort((a, b) =>
      compareVersions(b, a)
    );

    expect(sorted.map(formatVersion)).toEqual(["25.12.5.44", "25.2.1.1", "9.1.0.0"]);
  });
});

describe("matchesPrefix", () => {
  it("matches leading components", () => {
    expect(matchesPrefix(v("25.12.5.44"), [25])).toBe(true);
    expect(matchesPrefix(v("25.12.5.44"), [25, 12])).toBe(true);
    expect(matchesPrefix(v("25.12.5.44"), [25, 12, 5])).toBe(true);
  });

  it("does not match on string prefix", () => {
    expect(matchesPrefix(v("25.12.5.44"), [25, 1])).toBe(false);
    expect(matchesPrefix(v("2.5.0.0"), [25])).toBe(false);
  });
});
