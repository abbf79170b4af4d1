/**
 * Configuration service module.
 */

export { ConfigService, createConfigService, type ConfigServiceDeps } from "./config-service.js";
export { type AppConfig, DEFAULT_APP_CONFIG, CONFIG_ENV_VARS } from "./types.js";
