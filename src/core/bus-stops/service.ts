/**
 * Bus Stop Service
 * Bus stop lookups backed by the cached DataMall list, plus real-time arrivals
 */

import { Logger } from '@utils/logger';
import type { AppConfig } from '@config/index';
import { fetchAllBusStops, fetchBusArrivals } from '@api/datamall';
import { BusStopCache } from './cache';
import type { CacheInfo } from './cache';
import { findByCode, findNearby, searchByRoad } from './query';
import type { BusArrival, BusStop, Coordinates, Dataset, NearbyBusStop } from '@/types';

export interface QueryOptions {
    /** Use the cached list when it is still fresh (default: true) */
    useCache?: boolean;
}

export interface NearbyOptions extends QueryOptions {
    /** Keep only the nearest N stops */
    limit?: number;
}

/** Collaborators, replaceable in tests */
export interface BusStopServiceDeps {
    cache?: BusStopCache;
    fetchStops?: () => Promise<BusStop[]>;
    fetchArrivals?: (busStopCode: string, serviceNo?: string) => Promise<BusArrival>;
}

export class BusStopService {
    private readonly cache: BusStopCache;
    private readonly fetchStops: () => Promise<BusStop[]>;
    private readonly fetchArrivals: (
        busStopCode: string,
        serviceNo?: string
    ) => Promise<BusArrival>;

    constructor(config: AppConfig, deps: BusStopServiceDeps = {}) {
        this.cache = deps.cache ?? BusStopCache.fromConfig(config);
        this.fetchStops = deps.fetchStops ?? (() => fetchAllBusStops(config));
        this.fetchArrivals =
            deps.fetchArrivals ??
            ((busStopCode, serviceNo) => fetchBusArrivals(config, busStopCode, serviceNo));
    }

    get cachePath(): string {
        return this.cache.path;
    }

    /**
     * The full bus stop list, from cache or freshly fetched
     */
    async getStops(options: QueryOptions = {}): Promise<Dataset> {
        return this.cache.getOrFetch(options.useCache ?? true, this.fetchStops);
    }

    async findByCode(code: string, options: QueryOptions = {}): Promise<BusStop | undefined> {
        const { stops } = await this.getStops(options);
        const stop = findByCode(stops, code);
        Logger.debug('Bus stop lookup', { code, found: stop !== undefined });
        return stop;
    }

    async searchByRoad(roadName: string, options: QueryOptions = {}): Promise<BusStop[]> {
        const { stops } = await this.getStops(options);
        const matches = searchByRoad(stops, roadName);
        Logger.debug('Road search', { roadName, count: matches.length });
        return matches;
    }

    /**
     * Stops within a radius of a location, nearest first
     */
    async findNearby(
        location: Coordinates,
        radiusKm: number,
        options: NearbyOptions = {}
    ): Promise<NearbyBusStop[]> {
        const { stops } = await this.getStops(options);

        Logger.info(
            `Searching for bus stops within ${radiusKm}km of (${location.latitude}, ${location.longitude})...`
        );
        const nearby = findNearby(stops, location, radiusKm);
        Logger.info(`Found ${nearby.length} bus stops within ${radiusKm}km`);

        return options.limit !== undefined ? nearby.slice(0, options.limit) : nearby;
    }

    /**
     * Real-time arrivals for a stop; never served from cache
     */
    async getArrivals(busStopCode: string, serviceNo?: string): Promise<BusArrival> {
        return this.fetchArrivals(busStopCode, serviceNo);
    }

    /**
     * Stop details for an arrivals header.
     * Only consults the cache: a missing or stale cache yields undefined instead of a full download.
     */
    async describeStop(code: string): Promise<BusStop | undefined> {
        if (!(await this.cache.isValid())) {
            return undefined;
        }
        try {
            const { stops } = await this.cache.load();
            return findByCode(stops, code);
        } catch (error) {
            Logger.debug('Could not read bus stop details', error);
            return undefined;
        }
    }

    clearCache(): Promise<boolean> {
        return this.cache.clear();
    }

    describeCache(): Promise<CacheInfo | null> {
        return this.cache.describe();
    }
}
