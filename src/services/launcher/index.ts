/**
 * Launcher module.
 */

export { LAUNCH_MODES, type LaunchMode, type LaunchOptions, type LaunchPlan } from "./types.js";
export {
  Launcher,
  createLauncher,
  hasConfigFileArg,
  SERVER_DATA_ARGS,
  type LauncherDeps,
} from "./launcher.js";
