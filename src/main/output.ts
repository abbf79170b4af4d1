/**
 * Terminal output for command handlers.
 */

import type { DownloadProgress } from "../services/version-manager/index.js";

/**
 * Where command handlers write. Results go to stdout, diagnostics and
 * transient progress to stderr.
 */
export interface CommandOutput {
  /** Write one line to stdout */
  line(text: string): void;
  /** Write one line to stderr */
  error(text: string): void;
  /** Replace the transient status line. No-op when stderr is not a terminal. */
  status(text: string): void;
  /** Erase the status line, if one is shown */
  clearStatus(): void;
}

interface WritableStream {
  write(chunk: string): boolean;
  readonly isTTY?: boolean;
}

/**
 * CommandOutput over process streams.
 */
export class ConsoleOutput implements CommandOutput {
  private statusShown = false;

  constructor(
    private readonly stdout: WritableStream = process.stdout,
    private readonly stderr: WritableStream = process.stderr
  ) {}

  line(text: string): void {
    this.clearStatus();
    this.stdout.write(`${text}\n`);
  }

  error(text: string): void {
    this.clearStatus();
    this.stderr.write(`${text}\n`);
  }

  status(text: string): void {
    if (!this.stderr.isTTY) return;
    this.stderr.write(`\r\x1b[2K${text}`);
    this.statusShown = true;
  }

  clearStatus(): void {
    if (!this.statusShown) return;
    this.stderr.write("\r\x1b[2K");
    this.statusShown = false;
  }
}

const UNITS = ["B", "KiB", "MiB", "GiB"] as const;

/**
 * Human-readable byte count: 512 B, 1.5 MiB.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Status line for a download in flight.
 */
export function formatProgress(progress: DownloadProgress): string {
  const downloaded = formatBytes(progress.bytesDownloaded);
  if (progress.totalBytes === null || progress.totalBytes === 0) {
    return `Downloading... ${downloaded}`;
  }
  const percent = Math.floor((progress.bytesDownloaded / progress.totalBytes) * 100);
  return `Downloading... ${downloaded} / ${formatBytes(progress.totalBytes)} (${percent}%)`;
}
