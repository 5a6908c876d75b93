/**
 * IP Geolocation API Clients
 * Approximate location lookups; none of these services need an API key
 */

import { z } from 'zod';
import { Logger } from '@utils/logger';
import { fetchJson } from '@utils/http';
import type { Coordinates } from '@/types';
import { CoordinatesSchema } from '@/types';

export interface LookupResult {
    coordinates: Coordinates;
    /** Human readable place, e.g. "Singapore, Singapore" */
    label?: string;
}

/** A lookup service: where to ask and how to read the answer */
export interface LookupService {
    name: string;
    url: string;
    schema: z.ZodType<LookupResult | null, z.ZodTypeDef, unknown>;
}

function placeLabel(...parts: (string | undefined)[]): string | undefined {
    const present = parts.filter((part): part is string => Boolean(part));
    return present.length > 0 ? present.join(', ') : undefined;
}

function toResult(latitude: number, longitude: number, label?: string): LookupResult | null {
    const coordinates = CoordinatesSchema.safeParse({ latitude, longitude });
    return coordinates.success ? { coordinates: coordinates.data, label } : null;
}

/** ip-api.com: `status` is "fail" for private or reserved addresses */
export const IP_API: LookupService = {
    name: 'ip-api',
    url: 'http://ip-api.com/json/',
    schema: z
        .object({
            status: z.string(),
            lat: z.number().optional(),
            lon: z.number().optional(),
            city: z.string().optional(),
            country: z.string().optional(),
        })
        .transform(data =>
            data.status === 'success' && data.lat !== undefined && data.lon !== undefined
                ? toResult(data.lat, data.lon, placeLabel(data.city, data.country))
                : null
        ),
};

/** ipinfo.io: coordinates come as a single "lat,lon" string */
export const IPINFO: LookupService = {
    name: 'ipinfo',
    url: 'https://ipinfo.io/json',
    schema: z
        .object({
            loc: z.string().optional(),
            city: z.string().optional(),
            country: z.string().optional(),
        })
        .transform(data => {
            const [lat, lon] = (data.loc ?? '').split(',').map(Number);
            return lat !== undefined && lon !== undefined && !isNaN(lat) && !isNaN(lon)
                ? toResult(lat, lon, placeLabel(data.city, data.country))
                : null;
        }),
};

/** ipapi.co */
export const IPAPI_CO: LookupService = {
    name: 'ipapi.co',
    url: 'https://ipapi.co/json/',
    schema: z
        .object({
            latitude: z.number().optional(),
            longitude: z.number().optional(),
            city: z.string().optional(),
            country_name: z.string().optional(),
        })
        .transform(data =>
            data.latitude !== undefined && data.longitude !== undefined
                ? toResult(data.latitude, data.longitude, placeLabel(data.city, data.country_name))
                : null
        ),
};

/** freeipapi.com */
export const FREEIPAPI: LookupService = {
    name: 'freeipapi',
    url: 'https://freeipapi.com/api/json',
    schema: z
        .object({
            latitude: z.number().optional(),
            longitude: z.number().optional(),
            cityName: z.string().optional(),
            countryName: z.string().optional(),
        })
        .transform(data =>
            data.latitude !== undefined && data.longitude !== undefined
                ? toResult(data.latitude, data.longitude, placeLabel(data.cityName, data.countryName))
                : null
        ),
};

/**
 * Ask one lookup service where this machine is
 * @returns The location, or null when the service answered without one
 * @throws FetchError on network, status or format failures
 */
export async function lookupLocation(
    service: LookupService,
    timeoutMs: number
): Promise<LookupResult | null> {
    Logger.debug('Looking up location', { service: service.name });
    return fetchJson(service.url, service.schema, { timeoutMs });
}
