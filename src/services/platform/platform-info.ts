/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, and os.homedir() for testability.
 */

import os from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** CPU architecture as reported by Node.js: 'x64', 'arm64', ... */
  readonly arch: NodeJS.Architecture;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * PlatformInfo implementation using Node.js APIs.
 *
 * Values are cached at construction time for consistency. Unsupported
 * platforms are reported as-is; callers that need a download target decide.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly platform: NodeJS.Platform;
  readonly arch: NodeJS.Architecture;
  readonly homeDir: string;

  constructor() {
    this.platform = process.platform;
    this.arch = process.arch;
    this.homeDir = os.homedir();
  }
}
