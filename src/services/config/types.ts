/**
 * Configuration types for the tool.
 *
 * The optional config.json in the store overrides defaults; a few
 * environment variables override both.
 */

/**
 * Effective configuration after defaults, file and environment are merged.
 */
export interface AppConfig {
  /** Releases listing endpoint (paginated with per_page/page) */
  readonly releasesUrl: string;
  /** Base for binary downloads: `{base}/{tag}/clickhouse-{os}-{arch}` */
  readonly downloadBaseUrl: string;
  /** Timeout for each catalog page request (ms) */
  readonly catalogTimeoutMs: number;
  /** Timeout until the download response starts (ms) */
  readonly downloadTimeoutMs: number;
  /** Safety bound on catalog pages followed */
  readonly maxCatalogPages: number;
  /** Staging and removal leftovers older than this are swept (ms) */
  readonly orphanMaxAgeMs: number;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  releasesUrl: "https://api.github.com/repos/ClickHouse/ClickHouse/releases",
  downloadBaseUrl: "https://github.com/ClickHouse/ClickHouse/releases/download",
  catalogTimeoutMs: 30_000,
  downloadTimeoutMs: 60_000,
  maxCatalogPages: 100,
  orphanMaxAgeMs: 60 * 60 * 1000,
};

/**
 * Environment variables mapped onto config keys.
 */
export const CONFIG_ENV_VARS = {
  CHV_RELEASES_URL: "releasesUrl",
  CHV_DOWNLOAD_BASE_URL: "downloadBaseUrl",
  CHV_CATALOG_TIMEOUT_MS: "catalogTimeoutMs",
  CHV_DOWNLOAD_TIMEOUT_MS: "downloadTimeoutMs",
} as const satisfies Record<string, keyof AppConfig>;
