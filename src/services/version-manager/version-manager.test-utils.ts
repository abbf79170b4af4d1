/**
 * Test utilities for the version manager.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Version } from "./types.js";
import { parseExactVersion } from "./version-spec.js";

/**
 * Parse an exact version for test setup.
 *
 * @example
 * v("25.12.5.44") // [25, 12, 5, 44]
 */
export function v(version: string): Version {
  const parsed = parseExactVersion(version);
  if (!parsed) {
    throw new Error(`Not an exact version: ${version}`);
  }
  return parsed;
}

/**
 * Place a fake binary at `<baseDir>/versions/<version>/clickhouse`.
 *
 * @returns Path of the binary
 */
export async function installFakeVersion(
  baseDir: string,
  version: string,
  content = "#!/bin/sh\necho fake\n"
): Promise<string> {
  const versionDir = join(baseDir, "versions", version);
  await mkdir(versionDir, { recursive: true });
  const binaryPath = join(versionDir, "clickhouse");
  await writeFile(binaryPath, content, { mode: 0o755 });
  return binaryPath;
}

/**
 * Write the default pointer file.
 */
export async function writeDefaultPointer(baseDir: string, content: string): Promise<void> {
  await mkdir(baseDir, { recursive: true });
  await writeFile(join(baseDir, "default"), content, "utf-8");
}
