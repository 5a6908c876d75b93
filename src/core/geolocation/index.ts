/**
 * Geolocation Module
 * Provides location services for finding nearby bus stops
 */

export { GeolocationService } from './service';
export type { ProviderSelection } from './service';
export { IpLocationProvider, GpsLocationProvider } from './providers';
export type { LocationProvider, LocationResult } from './providers';
export { GeolocationError } from './errors';
