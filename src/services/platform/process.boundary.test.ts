// @vitest-environment node
import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { ExecaProcessRunner } from "./process.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { createTempDir } from "../test-utils.js";

const TEST_TIMEOUT = 10000;

describe("ExecaProcessRunner (boundary)", () => {
  const runner = new ExecaProcessRunner(SILENT_LOGGER);

  it(
    "reports the exit code of the child",
    async () => {
      const result = await runner.runInteractive(process.execPath, ["-e", "process.exit(3)"]);

      expect(result).toEqual({ exitCode: 3 });
    },
    TEST_TIMEOUT
  );

  it(
    "reports a clean exit as code 0",
    async () => {
      const result = await runner.runInteractive(process.execPath, ["-e", ""]);

      expect(result).toEqual({ exitCode: 0 });
    },
    TEST_TIMEOUT
  );

  it(
    "runs in the requested working directory",
    async () => {
      const tempDir = await createTempDir();
      try {
        const script = `process.exit(process.cwd() === ${JSON.stringify(tempDir.path)} ? 0 : 7)`;

        const result = await runner.runInteractive(process.execPath, ["-e", script], {
          cwd: tempDir.path,
        });

        expect(result.exitCode).toBe(0);
      } finally {
        await tempDir.cleanup();
      }
    },
    TEST_TIMEOUT
  );

  it.skipIf(process.platform === "win32")(
    "reports the signal when the child is killed",
    async () => {
      const result = await runner.runInteractive(process.execPath, [
        "-e",
        "process.kill(process.pid, 'SIGKILL')",
      ]);

      expect(result).toEqual({ exitCode: null, signal: "SIGKILL" });
    },
    TEST_TIMEOUT
  );

  it(
    "returns an error instead of throwing when the binary is missing",
    async () => {
      const tempDir = await createTempDir();
      try {
        const result = await runner.runInteractive(join(tempDir.path, "clickhouse"), ["local"]);

        expect(result.exitCode).toBeNull();
        expect(result.error).toMatch(/ENOENT/);
      } finally {
        await tempDir.cleanup();
      }
    },
    TEST_TIMEOUT
  );
});
