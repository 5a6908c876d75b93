/**
 * Centralized Type Definitions
 */

import { z } from 'zod';

// --- Shared helpers ---

/** Accepts a number or a numeric string (the API and older caches use both) */
const NumericSchema = z.union([
    z.number(),
    z
        .string()
        .trim()
        .min(1)
        .transform(value => Number(value)),
]);

const LatitudeSchema = NumericSchema.pipe(z.number().min(-90).max(90));
const LongitudeSchema = NumericSchema.pipe(z.number().min(-180).max(180));

// --- Geolocation Types ---

/** Geographic coordinates (WGS84) */
export const CoordinatesSchema = z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
});
export type Coordinates = z.infer<typeof CoordinatesSchema>;

export const LocationSourceSchema = z.enum(['ip', 'gps', 'manual', 'default']);
export type LocationSource = z.infer<typeof LocationSourceSchema>;

/** Location with coordinates and optional metadata */
export const LocationSchema = z.object({
    coordinates: CoordinatesSchema,
    source: LocationSourceSchema,
    timestamp: z.number(),
    label: z.string().optional(),
});
export type Location = z.infer<typeof LocationSchema>;

/** Geolocation error codes */
export const GeolocationErrorCode = {
    POSITION_UNAVAILABLE: 1,
    TIMEOUT: 2,
    NETWORK_ERROR: 3,
} as const;
export type GeolocationErrorCodeType =
    (typeof GeolocationErrorCode)[keyof typeof GeolocationErrorCode];

// --- Bus Stop Types ---

/** Bus stop as used throughout the app and stored in the cache */
export const BusStopSchema = z.object({
    code: z.string().trim().min(1),
    roadName: z.string(),
    description: z.string(),
    latitude: LatitudeSchema,
    longitude: LongitudeSchema,
});
export type BusStop = z.infer<typeof BusStopSchema>;

/** Bus stop with calculated distance */
export interface NearbyBusStop extends BusStop {
    distanceMeters: number;
}

/** Full bus stop list with the time it was obtained */
export interface Dataset {
    stops: BusStop[];
    cachedAt: Date;
}

/** On-disk cache file layout */
export const CacheFileSchema = z.object({
    cachedAt: z.string().datetime({ offset: true }),
    totalStops: z.number().int().nonnegative(),
    bus_stops: z.array(BusStopSchema),
});
export type CacheFile = z.infer<typeof CacheFileSchema>;

// --- LTA DataMall Types ---

/** Bus stop record as returned by the DataMall BusStops endpoint */
export const DataMallBusStopSchema = z
    .object({
        BusStopCode: z.string().trim().min(1),
        RoadName: z.string(),
        Description: z.string(),
        Latitude: LatitudeSchema,
        Longitude: LongitudeSchema,
    })
    .transform(
        (raw): BusStop => ({
            code: raw.BusStopCode,
            roadName: raw.RoadName,
            description: raw.Description,
            latitude: raw.Latitude,
            longitude: raw.Longitude,
        })
    );

/** One page of the BusStops endpoint */
export const DataMallBusStopPageSchema = z.object({
    value: z.array(DataMallBusStopSchema),
});

/** Bus load indicator: seats, standing, limited standing */
export const BusLoadSchema = z.enum(['SEA', 'SDA', 'LSD']);
export type BusLoad = z.infer<typeof BusLoadSchema>;

/** A single upcoming bus (fields are empty strings when there is no bus) */
const NextBusSchema = z.object({
    EstimatedArrival: z.string().default(''),
    Load: z.union([BusLoadSchema, z.literal('')]).catch(''),
    Feature: z.string().default(''),
    Type: z.string().default(''),
});

const EmptyNextBus = { EstimatedArrival: '', Load: '', Feature: '', Type: '' } as const;

const ArrivalServiceSchema = z
    .object({
        ServiceNo: z.string(),
        Operator: z.string().default(''),
        NextBus: NextBusSchema.default(EmptyNextBus),
        NextBus2: NextBusSchema.default(EmptyNextBus),
        NextBus3: NextBusSchema.default(EmptyNextBus),
    })
    .transform(raw => ({
        serviceNo: raw.ServiceNo,
        operator: raw.Operator,
        nextBuses: [raw.NextBus, raw.NextBus2, raw.NextBus3].map(bus => ({
            estimatedArrival: bus.EstimatedArrival,
            load: bus.Load === '' ? undefined : bus.Load,
            feature: bus.Feature,
            type: bus.Type,
        })),
    }));
export type ArrivalService = z.infer<typeof ArrivalServiceSchema>;
export type UpcomingBus = ArrivalService['nextBuses'][number];

/** Response of the v3 BusArrival endpoint */
export const BusArrivalSchema = z
    .object({
        BusStopCode: z.string(),
        Services: z.array(ArrivalServiceSchema).default([]),
    })
    .transform(raw => ({
        busStopCode: raw.BusStopCode,
        services: raw.Services,
    }));
export type BusArrival = z.infer<typeof BusArrivalSchema>;
