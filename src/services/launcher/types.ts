/**
 * Types for the launcher contract.
 */

import type { Version } from "../version-manager/types.js";

/**
 * How the binary is run.
 */
export type LaunchMode = "local" | "client" | "server";

export const LAUNCH_MODES: readonly LaunchMode[] = ["local", "client", "server"];

/**
 * Options for Launcher.planLaunch.
 */
export interface LaunchOptions {
  /** Explicit version; the default is used when omitted */
  readonly version?: Version | null;
  /** Run this query with `local --query`, ignoring mode and args */
  readonly sql?: string;
}

/**
 * Everything a process runner needs to start the binary.
 */
export interface LaunchPlan {
  readonly binaryPath: string;
  readonly args: readonly string[];
  /** Working directory, or null to inherit */
  readonly cwd: string | null;
  readonly version: Version;
}
