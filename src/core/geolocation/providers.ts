/**
 * Location Providers
 * Interchangeable ways of finding where the user is, chosen at startup
 */

import { Logger } from '@utils/logger';
import { FetchError } from '@api/errors';
import { FREEIPAPI, IPAPI_CO, IPINFO, IP_API, lookupLocation } from '@api/ip-geolocation';
import type { LookupService } from '@api/ip-geolocation';
import { GeolocationError } from './errors';
import type { Location, LocationSource } from '@/types';
import { GeolocationErrorCode } from '@/types';

/**
 * Result type for location acquisition
 */
export type LocationResult =
    | { success: true; location: Location }
    | { success: false; error: GeolocationError };

export interface LocationProvider {
    readonly source: LocationSource;
    locate(): Promise<LocationResult>;
}

function toGeolocationError(error: unknown): GeolocationError {
    if (error instanceof GeolocationError) {
        return error;
    }
    if (error instanceof FetchError) {
        return new GeolocationError(
            error.message,
            error.isTimeout() ? GeolocationErrorCode.TIMEOUT : GeolocationErrorCode.NETWORK_ERROR,
            error
        );
    }
    return new GeolocationError(
        String(error),
        GeolocationErrorCode.POSITION_UNAVAILABLE,
        error instanceof Error ? error : undefined
    );
}

/**
 * Ask each lookup service in turn; the first one that answers wins
 */
async function locateWithServices(
    source: LocationSource,
    services: readonly LookupService[],
    timeoutMs: number
): Promise<LocationResult> {
    let lastError = new GeolocationError(
        'No location services configured',
        GeolocationErrorCode.POSITION_UNAVAILABLE
    );

    for (const service of services) {
        try {
            const result = await lookupLocation(service, timeoutMs);
            if (!result) {
                throw new GeolocationError(
                    `${service.name} could not locate this address`,
                    GeolocationErrorCode.POSITION_UNAVAILABLE
                );
            }

            const { latitude, longitude } = result.coordinates;
            Logger.info(
                `Location detected via ${service.name}: ${result.label ?? 'Unknown location'} (${latitude}, ${longitude})`
            );
            return {
                success: true,
                location: {
                    coordinates: result.coordinates,
                    source,
                    label: result.label,
                    timestamp: Date.now(),
                },
            };
        } catch (error) {
            lastError = toGeolocationError(error);
            Logger.debug(`${service.name} provider failed`, { message: lastError.message });
        }
    }

    return { success: false, error: lastError };
}

/**
 * Approximate location from the public IP address.
 * Unreliable behind VPNs and corporate proxies.
 */
export class IpLocationProvider implements LocationProvider {
    readonly source = 'ip' as const;

    constructor(
        private readonly timeoutMs: number,
        private readonly services: readonly LookupService[] = [IP_API]
    ) {}

    async locate(): Promise<LocationResult> {
        Logger.info('Attempting to detect your location...');
        const result = await locateWithServices(this.source, this.services, this.timeoutMs);
        if (!result.success) {
            Logger.warn(`Could not detect location: ${result.error.message}`);
        }
        return result;
    }
}

/**
 * Best-effort precise location (`--gps`).
 * Consults several independent lookup services in order of preference.
 */
export class GpsLocationProvider implements LocationProvider {
    readonly source = 'gps' as const;

    constructor(
        private readonly timeoutMs: number,
        private readonly services: readonly LookupService[] = [IPINFO, IPAPI_CO, FREEIPAPI]
    ) {}

    async locate(): Promise<LocationResult> {
        Logger.info('Attempting to detect your location using multiple location providers...');
        const result = await locateWithServices(this.source, this.services, this.timeoutMs);
        if (!result.success) {
            Logger.warn('All GPS providers failed');
        }
        return result;
    }
}
