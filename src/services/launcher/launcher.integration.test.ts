// @vitest-environment node
/**
 * Integration tests for Launcher with a real store and project directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { readdir } from "node:fs/promises";
import { Launcher, hasConfigFileArg } from "./launcher.js";
import { VersionStore } from "../version-manager/version-store.js";
import { ProjectDataScoper } from "../project-data/project-data-scoper.js";
import { DefaultFileSystemLayer } from "../platform/filesystem.js";
import { createMockPathProvider } from "../platform/path-provider.test-utils.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";
import { createTempDir } from "../test-utils.js";
import {
  installFakeVersion,
  v,
  writeDefaultPointer,
} from "../version-manager/version-manager.test-utils.js";

describe("Launcher (integration)", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };
  let baseDir: string;
  let projectRoot: string;
  let store: VersionStore;
  let launcher: Launcher;

  beforeEach(async () => {
    tempDir = await createTempDir();
    baseDir = join(tempDir.path, "home", ".clickhouse");
    projectRoot = join(tempDir.path, "project");
    const fileSystem = new DefaultFileSystemLayer();
    const pathProvider = createMockPathProvider({ baseDir });
    const logger = createSilentLogger();
    store = new VersionStore({
      fileSystem,
      pathProvider,
      logger,
      config: { orphanMaxAgeMs: 60 * 60 * 1000 },
    });
    launcher = new Launcher({
      store,
      projectData: new ProjectDataScoper({ fileSystem, pathProvider, projectRoot, logger }),
      logger,
    });
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("resolveBinary", () => {
    it("returns the binary of an explicit installed version", async () => {
      const binaryPath = await installFakeVersion(baseDir, "24.8.10.6");

      expect(await launcher.resolveBinary(v("24.8.10.6"))).toBe(binaryPath);
    });

    it("fails with NOT_INSTALLED for an explicit missing version", async () => {
      await expect(launcher.resolveBinary(v("24.8.10.6"))).rejects.toMatchObject({
        code: "NOT_INSTALLED",
      });
    });

    it("uses the default when no version is given", async () => {
      const binaryPath = await installFakeVersion(baseDir, "25.12.5.44");
      await store.setDefault(v("25.12.5.44"));

      expect(await launcher.resolveBinary()).toBe(binaryPath);
      expect(await launcher.resolveBinary(null)).toBe(binaryPath);
    });

    it("fails with NO_DEFAULT_SET without default", async () => {
      await expect(launcher.resolveBinary()).rejects.toMatchObject({
        code: "NO_DEFAULT_SET",
        message: "No default version set. Run: chv use <version>",
      });
    });

    it("propagates CORRUPT_DEFAULT", async () => {
      await writeDefaultPointer(baseDir, "25.12.5.44\n");

      await expect(launcher.resolveBinary()).rejects.toMatchObject({ code: "CORRUPT_DEFAULT" });
    });
  });

  describe("resolveDataDir", () => {
    it("returns null for local and client", async () => {
      expect(await launcher.resolveDataDir(v("25.12.5.44"), "local")).toBeNull();
      expect(await launcher.resolveDataDir(v("25.12.5.44"), "client")).toBeNull();
      await expect(readdir(projectRoot)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("creates the project data dir for server", async () => {
      const dir = await launcher.resolveDataDir(v("25.12.5.44"), "server");

      expect(dir).toBe(join(projectRoot, ".clickhouse", "25.12.5.44"));
    });
  });

  describe("planLaunch", () => {
    let binaryPath: string;

    beforeEach(async () => {
      binaryPath = await installFakeVersion(baseDir, "25.12.5.44");
      await store.setDefault(v("25.12.5.44"));
    });

    it("plans client runs with passthrough args", async () => {
      const plan = await launcher.planLaunch("client", ["--port", "9001"]);

      expect(plan).toEqual({
        binaryPath,
        args: ["client", "--port", "9001"],
        cwd: null,
        version: [25, 12, 5, 44],
      });
    });

    it("plans a sql query through local", async () => {
      const plan = await launcher.planLaunch("local", ["--ignored"], { sql: "SELECT 1" });

      expect(plan.args).toEqual(["local", "--query", "SELECT 1"]);
      expect(plan.cwd).toBeNull();
    });

    it("runs the server inside the project data dir", async () => {
      const plan = await launcher.planLaunch("server", ["--http_port=8124"]);

      expect(plan).toEqual({
        binaryPath,
        args: ["server", "--http_port=8124", "--", "--path=./data/"],
        cwd: join(projectRoot, ".clickhouse", "25.12.5.44"),
        version: [25, 12, 5, 44],
      });
    });

    it("leaves the server alone when a config file is given", async () => {
      const plan = await launcher.planLaunch("server", ["-C", "/etc/ch.xml"]);

      expect(plan.args).toEqual(["server", "-C", "/etc/ch.xml"]);
      expect(plan.cwd).toBeNull();
    });

    it("uses an explicit version over the default", async () => {
      const other = await installFakeVersion(baseDir, "24.8.10.6");

      const plan = await launcher.planLaunch("server", [], { version: v("24.8.10.6") });

      expect(plan.binaryPath).toBe(other);
      expect(plan.cwd).toBe(join(projectRoot, ".clickhouse", "24.8.10.6"));
    });
  });
});

describe("hasConfigFileArg", () => {
  it.each([
    [["--config-file", "a.xml"], true],
    [["--config-file=a.xml"], true],
    [["-C", "a.xml"], true],
    [["-Ca.xml"], true],
    [["--http_port=8124"], false],
    [[], false],
  ] as const)("%j -> %s", (args, expected) => {
    expect(hasConfigFileArg(args)).toBe(expected);
  });
});
