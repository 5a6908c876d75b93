/**
 * File Cache for the Bus Stop List
 * Keeps a time-bounded copy of the full DataMall bus stop list on disk
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { Logger } from '@utils/logger';
import type { AppConfig } from '@config/index';
import { CacheReadError, CacheReadErrorReason } from './errors';
import type { BusStop, CacheFile, Dataset } from '@/types';
import { CacheFileSchema } from '@/types';

const HOUR_MS = 60 * 60 * 1000;

export interface BusStopCacheOptions {
    dir: string;
    fileName: string;
    expiryHours: number;
    /** Clock, overridable in tests */
    now?: () => Date;
}

/** Summary of the cache file for `--cache-info` */
export interface CacheInfo {
    path: string;
    cachedAt: Date;
    expiresAt: Date;
    totalStops: number;
    valid: boolean;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Bus stop list cache.
 *
 * Writes go to a temporary file in the same directory which is then renamed
 * over the cache file, so a reader sees either the old or the new list.
 * Concurrent writers are not coordinated: the last rename wins.
 */
export class BusStopCache {
    readonly path: string;
    private readonly dir: string;
    private readonly expiryMs: number;
    private readonly now: () => Date;

    constructor(options: BusStopCacheOptions) {
        this.dir = options.dir;
        this.path = join(options.dir, options.fileName);
        this.expiryMs = options.expiryHours * HOUR_MS;
        this.now = options.now ?? (() => new Date());
    }

    static fromConfig(config: AppConfig, now?: () => Date): BusStopCache {
        return new BusStopCache({ ...config.cache, now });
    }

    /**
     * True if a readable cache exists and has not expired. Never throws.
     */
    async isValid(): Promise<boolean> {
        const result = await this.tryRead();
        if (!result.ok) {
            return false;
        }
        return this.isFresh(result.dataset);
    }

    /**
     * Read the cached bus stop list
     * @throws CacheReadError if the file is missing or unusable
     */
    async load(): Promise<Dataset> {
        const result = await this.tryRead();
        if (!result.ok) {
            throw result.error;
        }
        return result.dataset;
    }

    /**
     * Replace the cache with a new bus stop list stamped with the current time
     */
    async save(stops: readonly BusStop[]): Promise<Dataset> {
        const cachedAt = this.now();
        const data: CacheFile = {
            cachedAt: cachedAt.toISOString(),
            totalStops: stops.length,
            bus_stops: [...stops],
        };

        await mkdir(this.dir, { recursive: true });
        const tempPath = `${this.path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
        try {
            await writeFile(tempPath, JSON.stringify(data), 'utf-8');
            await rename(tempPath, this.path);
        } catch (error) {
            await rm(tempPath, { force: true });
            throw error;
        }

        Logger.success(`Saved ${stops.length} bus stops to cache: ${this.path}`);
        return { stops: data.bus_stops, cachedAt };
    }

    /**
     * Cached list when allowed and fresh, otherwise a fresh fetch that is then cached.
     * Cache problems only ever cause a refetch; fetch failures propagate.
     */
    async getOrFetch(
        useCache: boolean,
        fetchFn: () => Promise<BusStop[]>
    ): Promise<Dataset> {
        if (useCache) {
            const result = await this.tryRead();
            if (result.ok && this.isFresh(result.dataset)) {
                Logger.info(
                    `Using cached bus stops (cached at ${result.dataset.cachedAt.toISOString()})`
                );
                return result.dataset;
            }
            if (result.ok) {
                Logger.info('Cache expired, will fetch fresh data');
            }
        }

        const stops = await fetchFn();

        try {
            return await this.save(stops);
        } catch (error) {
            Logger.warn('Failed to write bus stop cache, continuing without it', {
                path: this.path,
                error: error instanceof Error ? error.message : String(error),
            });
            return { stops, cachedAt: this.now() };
        }
    }

    /**
     * Delete the cache file
     * @returns true if a file was removed
     */
    async clear(): Promise<boolean> {
        try {
            await rm(this.path);
            Logger.info(`Removed bus stop cache: ${this.path}`);
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return false;
            }
            throw error;
        }
    }

    /**
     * Describe the cache file, or null when there is no usable cache
     */
    async describe(): Promise<CacheInfo | null> {
        const result = await this.tryRead();
        if (!result.ok) {
            return null;
        }
        const { cachedAt, stops } = result.dataset;
        return {
            path: this.path,
            cachedAt,
            expiresAt: new Date(cachedAt.getTime() + this.expiryMs),
            totalStops: stops.length,
            valid: this.isFresh(result.dataset),
        };
    }

    private isFresh(dataset: Dataset): boolean {
        return this.now().getTime() < dataset.cachedAt.getTime() + this.expiryMs;
    }

    private async tryRead(): Promise<
        { ok: true; dataset: Dataset } | { ok: false; error: CacheReadError }
    > {
        let text: string;
        try {
            text = await readFile(this.path, 'utf-8');
        } catch (error) {
            const missing = isErrnoException(error) && error.code === 'ENOENT';
            if (!missing) {
                Logger.warn('Error reading cache', error);
            }
            return {
                ok: false,
                error: new CacheReadError(
                    missing ? 'No cache file' : 'Cache file could not be read',
                    missing ? CacheReadErrorReason.MISSING : CacheReadErrorReason.UNREADABLE,
                    this.path,
                    error instanceof Error ? error : undefined
                ),
            };
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            Logger.warn('Error reading cache: not valid JSON', { path: this.path });
            return {
                ok: false,
                error: new CacheReadError(
                    'Cache file is not valid JSON',
                    CacheReadErrorReason.CORRUPT,
                    this.path,
                    error instanceof Error ? error : undefined
                ),
            };
        }

        const validated = CacheFileSchema.safeParse(raw);
        if (!validated.success) {
            Logger.warn('Error reading cache: unexpected format', {
                path: this.path,
                issues: validated.error.issues.length,
            });
            return {
                ok: false,
                error: new CacheReadError(
                    'Cache file has an unexpected format',
                    CacheReadErrorReason.INVALID,
                    this.path,
                    validated.error
                ),
            };
        }

        Logger.debug('Loaded bus stops from cache', {
            count: validated.data.bus_stops.length,
        });
        return {
            ok: true,
            dataset: {
                stops: validated.data.bus_stops,
                cachedAt: new Date(validated.data.cachedAt),
            },
        };
    }
}
