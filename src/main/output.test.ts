/**
 * Tests for terminal output helpers.
 */

import { describe, it, expect } from "vitest";
import { ConsoleOutput, formatBytes, formatProgress } from "./output.js";

interface FakeStream {
  readonly chunks: string[];
  readonly isTTY: boolean;
  write(chunk: string): boolean;
}

function createStream(isTTY: boolean): FakeStream {
  const chunks: string[] = [];
  return {
    chunks,
    isTTY,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
  };
}

describe("ConsoleOutput", () => {
  it("writes lines to stdout and errors to stderr", () => {
    const stdout = createStream(false);
    const stderr = createStream(false);
    const output = new ConsoleOutput(stdout, stderr);

    output.line("Installed versions:");
    output.error("Error: boom");

    expect(stdout.chunks).toEqual(["Installed versions:\n"]);
    expect(stderr.chunks).toEqual(["Error: boom\n"]);
  });

  it("drops status lines when stderr is not a terminal", () => {
    const stderr = createStream(false);
    const output = new ConsoleOutput(createStream(false), stderr);

    output.status("Downloading... 1 B");
    output.clearStatus();

    expect(stderr.chunks).toEqual([]);
  });

  it("rewrites the status line in place on a terminal", () => {
    const stderr = createStream(true);
    const output = new ConsoleOutput(createStream(false), stderr);

    output.status("one");
    output.status("two");

    expect(stderr.chunks).toEqual(["\r\x1b[2Kone", "\r\x1b[2Ktwo"]);
  });

  it("erases the status line before printing a result", () => {
    const stdout = createStream(false);
    const stderr = createStream(true);
    const output = new ConsoleOutput(stdout, stderr);

    output.status("Resolving version stable...");
    output.line("ClickHouse 25.12.5.44 installed successfully");
    output.line("again");

    expect(stderr.chunks).toEqual(["\r\x1b[2KResolving version stable...", "\r\x1b[2K"]);
    expect(stdout.chunks).toEqual(["ClickHouse 25.12.5.44 installed successfully\n", "again\n"]);
  });
});

describe("formatBytes", () => {
  it.each([
    [0, "0 B"],
    [1023, "1023 B"],
    [1024, "1.0 KiB"],
    [1536, "1.5 KiB"],
    [5 * 1024 * 1024, "5.0 MiB"],
    [3 * 1024 * 1024 * 1024, "3.0 GiB"],
    [4096 * 1024 * 1024 * 1024, "4096.0 GiB"],
  ] as const)("formats %d as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe("formatProgress", () => {
  it("shows size and percentage when the total is known", () => {
    expect(formatProgress({ bytesDownloaded: 512 * 1024, totalBytes: 2048 * 1024 })).toBe(
      "Downloading... 512.0 KiB / 2.0 MiB (25%)"
    );
  });

  it("shows only the downloaded size without a total", () => {
    expect(formatProgress({ bytesDownloaded: 100, totalBytes: null })).toBe(
      "Downloading... 100 B"
    );
  });
});
