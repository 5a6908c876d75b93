import { describe, it, expect } from 'vitest';
import { findByCode, findNearby, searchByRoad } from './query';
import type { BusStop } from '@/types';

const ORCHARD_CENTRE = { latitude: 1.3, longitude: 103.83 };

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
    {
        code: '08057',
        roadName: 'Orchard Blvd',
        description: 'Orchard Blvd Stn',
        latitude: 1.3045,
        longitude: 103.83,
    },
    {
        code: '09048',
        roadName: 'Grange Rd',
        description: 'Grange Residences',
        latitude: 1.2955,
        longitude: 103.83,
    },
];

describe('findByCode', () => {
    it('should return the stop with the exact code', () => {
        expect(findByCode(stops, '13011')).toEqual(stops[0]);
    });

    it('should return undefined for an unknown code', () => {
        expect(findByCode(stops, '99999')).toBeUndefined();
    });

    it('should not match partial codes', () => {
        expect(findByCode(stops, '1301')).toBeUndefined();
    });
});

describe('searchByRoad', () => {
    it('should match road names case-insensitively and sort by code', () => {
        const codes = searchByRoad(stops, 'orchard').map(stop => stop.code);

        expect(codes).toEqual(['02049', '08057', '13011']);
    });

    it('should return the same stops regardless of search case', () => {
        expect(searchByRoad(stops, 'ORCHARD')).toEqual(searchByRoad(stops, 'orchard'));
    });

    it('should match a substring anywhere in the road name', () => {
        expect(searchByRoad(stops, 'set r').map(stop => stop.code)).toEqual(['13019']);
    });

    it('should return an empty list when nothing matches', () => {
        expect(searchByRoad(stops, 'Changi')).toEqual([]);
    });

    it('should not reorder the input list', () => {
        const before = stops.map(stop => stop.code);
        searchByRoad(stops, 'rd');
        expect(stops.map(stop => stop.code)).toEqual(before);
    });
});

describe('findNearby', () => {
    it('should return stops within the radius, nearest first', () => {
        const nearby = findNearby(stops, ORCHARD_CENTRE, 0.6);

        expect(nearby.map(stop => [stop.code, stop.distanceMeters])).toEqual([
            ['13011', 0],
            ['08057', 500],
            ['09048', 500],
            ['13019', 567],
        ]);
    });

    it('should keep dataset order for equal distances', () => {
        const reversed = [...stops].reverse();
        const nearby = findNearby(reversed, ORCHARD_CENTRE, 0.6);

        expect(nearby.map(stop => stop.code)).toEqual(['13011', '09048', '08057', '13019']);
    });

    it('should exclude stops just outside the radius', () => {
        // 08057 and 09048 are about 500.4m away
        const nearby = findNearby(stops, ORCHARD_CENTRE, 0.5);

        expect(nearby.map(stop => stop.code)).toEqual(['13011']);
    });

    it('should exclude a stop inside the radius whose rounded distance exceeds it', () => {
        // about 499.6m east of the origin
        const stop: BusStop = {
            code: '99001',
            roadName: 'Test Rd',
            description: 'Edge Stop',
            latitude: 0,
            longitude: 0.004493,
        };
        const origin = { latitude: 0, longitude: 0 };

        expect(findNearby([stop], origin, 0.4997)).toEqual([]);
        expect(findNearby([stop], origin, 0.5)).toEqual([{ ...stop, distanceMeters: 500 }]);
    });

    it('should never return a stop further than the radius', () => {
        for (const radiusKm of [0.0005, 0.1, 0.5, 0.567, 1, 2]) {
            const nearby = findNearby(stops, ORCHARD_CENTRE, radiusKm);
            for (const stop of nearby) {
                expect(stop.distanceMeters).toBeLessThanOrEqual(radiusKm * 1000);
            }
        }
    });

    it('should sort results by non-decreasing distance', () => {
        const nearby = findNearby(stops, { latitude: 1.2995, longitude: 103.836 }, 5);
        const distances = nearby.map(stop => stop.distanceMeters);

        expect(nearby).toHaveLength(stops.length);
        expect(distances).toEqual([...distances].sort((a, b) => a - b));
    });

    it('should return an empty list when no stop is in range', () => {
        expect(findNearby(stops, { latitude: 1.36, longitude: 103.99 }, 0.5)).toEqual([]);
    });

    it('should keep the stop fields alongside the distance', () => {
        const [nearest] = findNearby(stops, ORCHARD_CENTRE, 0.1);

        expect(nearest).toEqual({ ...stops[0], distanceMeters: 0 });
    });

    it('should not modify the stop list', () => {
        const snapshot = JSON.stringify(stops);
        findNearby(stops, ORCHARD_CENTRE, 2);
        expect(JSON.stringify(stops)).toBe(snapshot);
    });
});
