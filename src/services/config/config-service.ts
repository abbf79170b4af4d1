/**
 * Configuration service for loading application configuration.
 *
 * This is a pure service (not a boundary abstraction) that uses FileSystemLayer
 * for I/O operations. Configuration is stored as JSON in {baseDir}/config.json.
 */

import { z } from "zod";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger } from "../logging/types.js";
import { ConfigError, isNotFoundError, getErrorMessage } from "../errors.js";
import type { AppConfig } from "./types.js";
import { CONFIG_ENV_VARS, DEFAULT_APP_CONFIG } from "./types.js";

const urlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: "URL must use http or https" })
  .transform((value) => value.replace(/\/+$/, ""));

const timeoutSchema = z.number().int().positive();

/**
 * Schema for config.json. Every key is optional; unknown keys are rejected.
 */
const configFileSchema = z
  .object({
    releasesUrl: urlSchema,
    downloadBaseUrl: urlSchema,
    catalogTimeoutMs: timeoutSchema,
    downloadTimeoutMs: timeoutSchema,
    maxCatalogPages: z.number().int().min(1).max(1000),
    orphanMaxAgeMs: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

/**
 * Schema for environment overrides. Values arrive as strings.
 */
const envSchema = z
  .object({
    releasesUrl: urlSchema,
    downloadBaseUrl: urlSchema,
    catalogTimeoutMs: z.coerce.number().pipe(timeoutSchema),
    downloadTimeoutMs: z.coerce.number().pipe(timeoutSchema),
  })
  .partial();

type ConfigOverrides = z.infer<typeof configFileSchema>;

const ENV_VAR_BY_KEY = new Map<string, string>(
  Object.entries(CONFIG_ENV_VARS).map(([envVar, key]) => [key, envVar])
);

function formatIssues(error: z.ZodError, nameFor: (key: string) => string): string {
  return error.issues
    .map((issue) => {
      const [first] = issue.path;
      return first === undefined ? issue.message : `${nameFor(String(first))}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Dependencies for ConfigService.
 */
export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: Pick<PathProvider, "configPath">;
  readonly logger: Logger;
  /** Environment to read overrides from. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Service for loading application configuration.
 */
export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: Pick<PathProvider, "configPath">;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
    this.env = deps.env ?? process.env;
  }

  /**
   * Load the effective configuration.
   * Precedence, lowest to highest: defaults, config.json, environment.
   *
   * @throws ConfigError if config.json or an environment override is invalid
   */
  async load(): Promise<AppConfig> {
    const fromFile = await this.loadFile();
    const fromEnv = this.loadEnv();
    const config: AppConfig = {
      releasesUrl: fromEnv.releasesUrl ?? fromFile.releasesUrl ?? DEFAULT_APP_CONFIG.releasesUrl,
      downloadBaseUrl:
        fromEnv.downloadBaseUrl ?? fromFile.downloadBaseUrl ?? DEFAULT_APP_CONFIG.downloadBaseUrl,
      catalogTimeoutMs:
        fromEnv.catalogTimeoutMs ?? fromFile.catalogTimeoutMs ?? DEFAULT_APP_CONFIG.catalogTimeoutMs,
      downloadTimeoutMs:
        fromEnv.downloadTimeoutMs ??
        fromFile.downloadTimeoutMs ??
        DEFAULT_APP_CONFIG.downloadTimeoutMs,
      maxCatalogPages: fromFile.maxCatalogPages ?? DEFAULT_APP_CONFIG.maxCatalogPages,
      orphanMaxAgeMs: fromFile.orphanMaxAgeMs ?? DEFAULT_APP_CONFIG.orphanMaxAgeMs,
    };
    this.logger.debug("Config resolved", {
      releasesUrl: config.releasesUrl,
      downloadBaseUrl: config.downloadBaseUrl,
      catalogTimeoutMs: config.catalogTimeoutMs,
    });
    return config;
  }

  private async loadFile(): Promise<ConfigOverrides> {
    const configPath = this.pathProvider.configPath;

    let content: string;
    try {
      content = await this.fileSystem.readFile(configPath);
    } catch (error) {
      // No file - defaults apply
      if (isNotFoundError(error)) {
        this.logger.debug("Config not found, using defaults", { path: configPath });
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${configPath}: ${getErrorMessage(error)}`);
    }

    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      const details = formatIssues(result.error, (key) => key);
      throw new ConfigError(`Invalid config in ${configPath}: ${details}`);
    }
    this.logger.debug("Config loaded", { path: configPath });
    return result.data;
  }

  private loadEnv(): z.infer<typeof envSchema> {
    const raw: Record<string, string> = {};
    for (const [envVar, key] of Object.entries(CONFIG_ENV_VARS)) {
      const value = this.env[envVar]?.trim();
      if (value) {
        raw[key] = value;
      }
    }

    const result = envSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        `Invalid environment override: ${formatIssues(
          result.error,
          (key) => ENV_VAR_BY_KEY.get(key) ?? key
        )}`
      );
    }
    return result.data;
  }
}

/**
 * Create a ConfigService instance.
 */
export function createConfigService(deps: ConfigServiceDeps): ConfigService {
  return new ConfigService(deps);
}
