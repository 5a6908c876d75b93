/**
 * Configuration Module
 * Unified access point for all configuration
 */

export {
    loadConfig,
    createConfig,
    requireApiKey,
    maskApiKey,
    DEFAULT_CONFIG_FILE,
} from './loader';
export type { LoadConfigOptions } from './loader';
export { ConfigSchema } from './schema';
export type { AppConfig, ConfigInput } from './schema';
export { ConfigError, ConfigErrorCode } from './errors';
export type { ConfigErrorCodeType } from './errors';
