/**
 * Configuration Loader
 * Builds the app configuration once at startup from an optional JSON file and the environment
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigSchema } from './schema';
import type { AppConfig, ConfigInput } from './schema';
import { ConfigError, ConfigErrorCode } from './errors';

export const DEFAULT_CONFIG_FILE = 'bus-stop-finder.config.json';

export interface LoadConfigOptions {
    /** Environment to read overrides from (defaults to process.env) */
    env?: NodeJS.ProcessEnv;
    /** Explicit config file path; falls back to BUS_STOP_FINDER_CONFIG, then the default file */
    path?: string;
    /** Base directory for relative paths */
    cwd?: string;
}

function readConfigFile(path: string): Record<string, unknown> {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError(
            `Could not read config file ${path}`,
            ConfigErrorCode.INVALID_CONFIG,
            undefined,
            error instanceof Error ? error : undefined
        );
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigError(
            `Config file ${path} must contain a JSON object`,
            ConfigErrorCode.INVALID_CONFIG
        );
    }
    return Object.fromEntries(Object.entries(raw));
}

function sectionOf(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const section = source[key];
    return typeof section === 'object' && section !== null && !Array.isArray(section)
        ? Object.fromEntries(Object.entries(section))
        : {};
}

function parseBooleanFlag(value: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Load configuration.
 * A missing config file means defaults; a malformed one is a ConfigError.
 * The API key is optional here so that cache-only commands work without it.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();
    const explicitPath = options.path ?? env.BUS_STOP_FINDER_CONFIG;
    const configPath = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

    let fileConfig: Record<string, unknown> = {};
    if (existsSync(configPath)) {
        fileConfig = readConfigFile(configPath);
    } else if (explicitPath) {
        throw new ConfigError(
            `Config file not found: ${configPath}`,
            ConfigErrorCode.INVALID_CONFIG
        );
    }

    const api = sectionOf(fileConfig, 'api');
    const cache = sectionOf(fileConfig, 'cache');

    if (env.LTA_API_KEY !== undefined && env.LTA_API_KEY.trim() !== '') {
        api.apiKey = env.LTA_API_KEY;
    }
    if (env.BUS_STOP_FINDER_CACHE_DIR) {
        cache.dir = env.BUS_STOP_FINDER_CACHE_DIR;
    }

    const merged: Record<string, unknown> = { ...fileConfig, api, cache };
    if (env.BUS_STOP_FINDER_DEBUG !== undefined) {
        merged.debug = parseBooleanFlag(env.BUS_STOP_FINDER_DEBUG);
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(
            'Invalid configuration',
            ConfigErrorCode.INVALID_CONFIG,
            result.error.issues
        );
    }

    const config = result.data;
    return {
        ...config,
        cache: { ...config.cache, dir: resolve(cwd, config.cache.dir) },
    };
}

/**
 * Build a config from partial input, for tests and embedding
 */
export function createConfig(input: ConfigInput = {}): AppConfig {
    return ConfigSchema.parse(input);
}

/**
 * Return the API key or fail with a ConfigError.
 * Called by every path that is about to contact the DataMall API.
 */
export function requireApiKey(config: AppConfig): string {
    const apiKey = config.api.apiKey;
    if (!apiKey) {
        throw new ConfigError('LTA_API_KEY is not configured', ConfigErrorCode.MISSING_API_KEY);
    }
    return apiKey;
}

/**
 * Mask an API key for logging: first and last four characters only
 */
export function maskApiKey(apiKey: string): string {
    return apiKey.length > 8 ? `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}` : '***';
}
