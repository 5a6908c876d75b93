/**
 * Great-circle distance (haversine formula)
 */

/** Mean Earth radius in kilometers */
export const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

/**
 * Distance in kilometers between two points given in degrees
 */
export function distanceKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
    const dLat = toRadians(lat2 - lat1);
    const dLon = toRadians(lon2 - lon1);

    const a =
        Math.sin(dLat / 2) * Math.sin(dLat / 2) +
        Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
    // Clamp: rounding can push `a` a hair above 1 for antipodal points
    const c = 2 * Math.atan2(Math.sqrt(Math.min(a, 1)), Math.sqrt(Math.max(1 - a, 0)));

    return EARTH_RADIUS_KM * c;
}
