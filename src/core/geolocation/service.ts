/**
 * Geolocation Service
 * Picks location providers and resolves a location, falling back to a configured default
 */

import { Logger } from '@utils/logger';
import type { AppConfig } from '@config/index';
import { GpsLocationProvider, IpLocationProvider } from './providers';
import type { LocationProvider } from './providers';
import type { GeolocationError } from './errors';
import type { Coordinates, Location } from '@/types';
import { CoordinatesSchema } from '@/types';

export interface ProviderSelection {
    /** Try the multi-service provider before plain IP lookup */
    gps?: boolean;
}

export const GeolocationService = {
    /**
     * Providers to try, most precise first
     */
    selectProviders(config: AppConfig, selection: ProviderSelection = {}): LocationProvider[] {
        const { timeoutMs } = config.location;
        const ip = new IpLocationProvider(timeoutMs);
        return selection.gps ? [new GpsLocationProvider(timeoutMs), ip] : [ip];
    },

    /**
     * First location any provider finds, otherwise the configured default.
     * Never rejects: provider failures are logged and skipped.
     */
    async resolveLocation(
        providers: readonly LocationProvider[],
        config: AppConfig
    ): Promise<Location> {
        let lastError: GeolocationError | undefined;
        for (const [index, provider] of providers.entries()) {
            const result = await provider.locate();
            if (result.success) {
                return result.location;
            }
            lastError = result.error;
            const next = providers[index + 1];
            if (next) {
                Logger.info(
                    `${provider.source.toUpperCase()} detection failed, falling back to ${next.source.toUpperCase()} geolocation...`
                );
            }
        }

        const { latitude, longitude, label } = config.location.defaultLocation;
        if (lastError) {
            Logger.warn(lastError.getUserMessage());
        }
        Logger.info(`Using default location: ${label}`);
        return {
            coordinates: { latitude, longitude },
            source: 'default',
            label,
            timestamp: Date.now(),
        };
    },

    /**
     * Location from coordinates given on the command line
     * @throws ZodError if the coordinates are out of range
     */
    fromCoordinates(coordinates: Coordinates): Location {
        return {
            coordinates: CoordinatesSchema.parse(coordinates),
            source: 'manual',
            timestamp: Date.now(),
        };
    },
};
