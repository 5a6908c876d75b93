/**
 * API Module
 * External API clients and data fetching
 */

// LTA DataMall (bus stops, bus arrivals)
export { fetchAllBusStops, fetchBusArrivals, ACCOUNT_KEY_HEADER } from './datamall';

// IP geolocation services
export { lookupLocation, IP_API, IPINFO, IPAPI_CO, FREEIPAPI } from './ip-geolocation';
export type { LookupService, LookupResult } from './ip-geolocation';

export { FetchError, FetchErrorKind } from './errors';
export type { FetchErrorKindType } from './errors';
