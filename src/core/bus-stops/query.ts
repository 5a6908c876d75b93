/**
 * Bus Stop Queries
 * Pure lookups over a bus stop list; the list is never modified
 */

import { distanceKm } from './distance';
import type { BusStop, Coordinates, NearbyBusStop } from '@/types';

/**
 * First stop whose code matches exactly
 */
export function findByCode(stops: readonly BusStop[], code: string): BusStop | undefined {
    return stops.find(stop => stop.code === code);
}

function compareCodes(a: BusStop, b: BusStop): number {
    if (a.code < b.code) return -1;
    if (a.code > b.code) return 1;
    return 0;
}

/**
 * Stops whose road name contains the search text (case-insensitive), sorted by code
 */
export function searchByRoad(stops: readonly BusStop[], roadName: string): BusStop[] {
    const term = roadName.toLowerCase();
    return stops.filter(stop => stop.roadName.toLowerCase().includes(term)).sort(compareCodes);
}

/**
 * Stops within `radiusKm` of a point, nearest first.
 * Equal distances keep their order in the list.
 */
export function findNearby(
    stops: readonly BusStop[],
    location: Coordinates,
    radiusKm: number
): NearbyBusStop[] {
    const radiusMeters = radiusKm * 1000;
    const nearby: NearbyBusStop[] = [];

    for (const stop of stops) {
        const km = distanceKm(location.latitude, location.longitude, stop.latitude, stop.longitude);
        if (km > radiusKm) continue;

        const distanceMeters = Math.round(km * 1000);
        // Rounding up must not push a stop past the radius
        if (distanceMeters > radiusMeters) continue;

        nearby.push({ ...stop, distanceMeters });
    }

    return nearby.sort((a, b) => a.distanceMeters - b.distanceMeters);
}
