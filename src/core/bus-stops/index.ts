/**
 * Bus Stops Module
 */

export { BusStopService } from './service';
export type { QueryOptions, NearbyOptions, BusStopServiceDeps } from './service';
export { BusStopCache } from './cache';
export type { BusStopCacheOptions, CacheInfo } from './cache';
export { CacheReadError, CacheReadErrorReason } from './errors';
export { findByCode, searchByRoad, findNearby } from './query';
export { distanceKm, EARTH_RADIUS_KM } from './distance';
