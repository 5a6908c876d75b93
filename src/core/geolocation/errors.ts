/**
 * Geolocation Error Types
 */

import type { GeolocationErrorCodeType } from '@/types';
import { GeolocationErrorCode } from '@/types';

/**
 * Custom error for location detection failures.
 * Providers report it in their result; it is never fatal.
 */
export class GeolocationError extends Error {
    constructor(
        message: string,
        public readonly code: GeolocationErrorCodeType,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'GeolocationError';
    }

    /** Check if this is a timeout error */
    isTimeout(): boolean {
        return this.code === GeolocationErrorCode.TIMEOUT;
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.code) {
            case GeolocationErrorCode.POSITION_UNAVAILABLE:
                return 'Could not determine your location. Try --lat and --lon instead.';
            case GeolocationErrorCode.TIMEOUT:
                return 'Location request timed out. Try again or pass --lat and --lon.';
            case GeolocationErrorCode.NETWORK_ERROR:
                return 'Network error while detecting your location.';
            default:
                return 'An unknown error occurred while detecting your location.';
        }
    }
}
