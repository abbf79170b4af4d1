/**
 * Service wiring for one CLI invocation.
 *
 * Platform layers are created first, then the configuration is loaded,
 * then the services are built on top of both.
 */

import { DefaultFileSystemLayer } from "../services/platform/filesystem.js";
import { DefaultNetworkLayer } from "../services/platform/network.js";
import { ExecaProcessRunner } from "../services/platform/process.js";
import type { PathProvider } from "../services/platform/path-provider.js";
import type { PlatformInfo } from "../services/platform/platform-info.js";
import type { LoggingService } from "../services/logging/index.js";
import { createConfigService, type AppConfig } from "../services/config/index.js";
import { createReleaseCatalog } from "../services/release-catalog/index.js";
import { createInstaller, createVersionStore } from "../services/version-manager/index.js";
import { createProjectDataScoper } from "../services/project-data/index.js";
import { createLauncher } from "../services/launcher/index.js";
import { createCommandRunner, type CommandRunner } from "./commands.js";
import type { CommandOutput } from "./output.js";

export interface BootstrapDeps {
  readonly platformInfo: PlatformInfo;
  readonly pathProvider: PathProvider;
  readonly loggingService: LoggingService;
  readonly output: CommandOutput;
  /** Working directory; project data lives beneath it */
  readonly cwd: string;
  /** Sent as User-Agent on every request */
  readonly userAgent: string;
  readonly env?: NodeJS.ProcessEnv;
}

export interface BootstrapResult {
  readonly runner: CommandRunner;
  readonly config: AppConfig;
}

/**
 * Build every service and the command runner.
 *
 * @throws ConfigError if config.json or an environment override is invalid
 */
export async function initializeBootstrap(deps: BootstrapDeps): Promise<BootstrapResult> {
  const { platformInfo, pathProvider, loggingService } = deps;

  const fileSystem = new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const config = await createConfigService({
    fileSystem,
    pathProvider,
    logger: loggingService.createLogger("config"),
    ...(deps.env !== undefined && { env: deps.env }),
  }).load();

  const httpClient = new DefaultNetworkLayer(loggingService.createLogger("network"), {
    defaultHeaders: { "User-Agent": deps.userAgent },
  });
  const catalog = createReleaseCatalog({
    httpClient,
    config,
    logger: loggingService.createLogger("release-catalog"),
  });
  const store = createVersionStore({
    fileSystem,
    pathProvider,
    config,
    logger: loggingService.createLogger("version-store"),
  });
  const installer = createInstaller({
    catalog,
    store,
    httpClient,
    fileSystem,
    platformInfo,
    config,
    logger: loggingService.createLogger("installer"),
  });
  const projectData = createProjectDataScoper({
    fileSystem,
    pathProvider,
    projectRoot: deps.cwd,
    logger: loggingService.createLogger("project-data"),
  });
  const launcher = createLauncher({
    store,
    projectData,
    logger: loggingService.createLogger("launcher"),
  });

  const runner = createCommandRunner({
    catalog,
    store,
    installer,
    projectData,
    launcher,
    processRunner: new ExecaProcessRunner(loggingService.createLogger("process")),
    output: deps.output,
    logger: loggingService.createLogger("cli"),
  });

  return { runner, config };
}
