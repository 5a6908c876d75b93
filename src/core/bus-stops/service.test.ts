import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createConfig } from '@config/index';
import { BusStopCache } from './cache';
import { BusStopService } from './service';
import type { BusArrival, BusStop } from '@/types';

const NOW = new Date('2026-03-01T08:00:00.000Z');

const stops: BusStop[] = [
    {
        code: '13011',
        roadName: 'Orchard Rd',
        description: 'Opp Ion Orchard',
        latitude: 1.3,
        longitude: 103.83,
    },
    {
        code: '13019',
        roadName: 'Somerset Rd',
        description: 'Somerset Stn',
        latitude: 1.301,
        longitude: 103.835,
    },
    {
        code: '02049',
        roadName: 'Orchard Rd',
        description: 'Dhoby Ghaut Stn',
        latitude: 1.3,
        longitude: 103.84,
    },
];

describe('BusStopService', () => {
    let dir: string;
    let cache: BusStopCache;
    let fetchStops: Mock<() => Promise<BusStop[]>>;
    let service: BusStopService;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'bus-stop-service-'));
        cache = new BusStopCache({
            dir,
            fileName: 'bus_stops_cache.json',
            expiryHours: 24,
            now: () => NOW,
        });
        fetchStops = vi.fn<() => Promise<BusStop[]>>().mockResolvedValue(stops);
        service = new BusStopService(createConfig(), { cache, fetchStops });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should fetch once and then serve lookups from the cache', async () => {
        expect(await service.findByCode('13011')).toEqual(stops[0]);
        expect(await service.findByCode('99999')).toBeUndefined();

        expect(fetchStops).toHaveBeenCalledTimes(1);
    });

    it('should refetch for every call when the cache is bypassed', async () => {
        await service.getStops({ useCache: false });
        await service.getStops({ useCache: false });

        expect(fetchStops).toHaveBeenCalledTimes(2);
    });

    it('should search roads over the cached list', async () => {
        const matches = await service.searchByRoad('ORCHARD');

        expect(matches.map(stop => stop.code)).toEqual(['02049', '13011']);
    });

    it('should find nearby stops and apply the limit', async () => {
        const location = { latitude: 1.3, longitude: 103.83 };

        const all = await service.findNearby(location, 1.5);
        const limited = await service.findNearby(location, 1.5, { limit: 2 });

        expect(all.map(stop => stop.code)).toEqual(['13011', '13019', '02049']);
        expect(limited.map(stop => stop.code)).toEqual(['13011', '13019']);
    });

    it('should describe a stop only from a valid cache', async () => {
        expect(await service.describeStop('13011')).toBeUndefined();
        expect(fetchStops).not.toHaveBeenCalled();

        await service.getStops();

        expect(await service.describeStop('13011')).toEqual(stops[0]);
    });

    it('should pass arrival requests to the arrivals client', async () => {
        const arrival: BusArrival = { busStopCode: '13011', services: [] };
        const fetchArrivals = vi.fn().mockResolvedValue(arrival);
        const withArrivals = new BusStopService(createConfig(), {
            cache,
            fetchStops,
            fetchArrivals,
        });

        expect(await withArrivals.getArrivals('13011', '7')).toBe(arrival);
        expect(fetchArrivals).toHaveBeenCalledWith('13011', '7');
    });
});
