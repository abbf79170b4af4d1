/**
 * Test utilities for PathProvider.
 */
import { join } from "node:path";
import { BINARY_NAME, PROJECT_DIR_NAME, type PathProvider } from "./path-provider.js";

/**
 * Options for createMockPathProvider.
 * Paths not overridden are derived from `baseDir`.
 */
export type MockPathProviderOptions = Partial<PathProvider>;

/**
 * Create a mock PathProvider with controllable behavior.
 * Defaults to test paths under `/test/home/.clickhouse/`.
 *
 * @example Against a temp directory
 * const pathProvider = createMockPathProvider({ baseDir: tempDir.path });
 */
export function createMockPathProvider(overrides?: MockPathProviderOptions): PathProvider {
  const baseDir = overrides?.baseDir ?? join("/test", "home", ".clickhouse");
  const versionsDir = overrides?.versionsDir ?? join(baseDir, "versions");
  const versionDir = overrides?.versionDir ?? ((version: string) => join(versionsDir, version));

  return {
    baseDir,
    versionsDir,
    defaultFile: overrides?.defaultFile ?? join(baseDir, "default"),
    configPath: overrides?.configPath ?? join(baseDir, "config.json"),
    logsDir: overrides?.logsDir ?? join(baseDir, "logs"),
    versionDir,
    binaryPath:
      overrides?.binaryPath ?? ((version: string) => join(versionDir(version), BINARY_NAME)),
    projectDir:
      overrides?.projectDir ?? ((projectRoot: string) => join(projectRoot, PROJECT_DIR_NAME)),
  };
}
