/**
 * Configuration Schema
 * Defaults for every setting; a config file and the environment override them
 */

import { z } from 'zod';

export const ConfigSchema = z.object({
    debug: z.boolean().default(false),
    api: z
        .object({
            /** LTA DataMall base URL (no trailing slash) */
            baseUrl: z
                .string()
                .url()
                .default('https://datamall2.mytransport.sg/ltaodataservice')
                .transform(url => url.replace(/\/+$/, '')),
            /** DataMall account key, usually from LTA_API_KEY */
            apiKey: z.string().trim().min(1).optional(),
            /** Timeout for each BusStops page request (ms) */
            pageTimeoutMs: z.number().int().positive().default(30000),
            /** Timeout for the BusArrival request (ms) */
            arrivalTimeoutMs: z.number().int().positive().default(10000),
            /** Upper bound on BusStops pages before the fetch is abandoned */
            maxPages: z.number().int().positive().default(100),
        })
        .default({}),
    cache: z
        .object({
            /** Directory holding the bus stop cache */
            dir: z.string().min(1).default('data'),
            fileName: z.string().min(1).default('bus_stops_cache.json'),
            /** Hours before the cached bus stop list is refetched */
            expiryHours: z.number().positive().default(24),
        })
        .default({}),
    location: z
        .object({
            /** Timeout for each location lookup request (ms) */
            timeoutMs: z.number().int().positive().default(5000),
            /** Used when every location provider fails */
            defaultLocation: z
                .object({
                    latitude: z.number().min(-90).max(90).default(1.2834),
                    longitude: z.number().min(-180).max(180).default(103.8607),
                    label: z.string().default('Marina Bay Sands'),
                })
                .default({}),
        })
        .default({}),
    search: z
        .object({
            /** Radius for nearby searches when --radius is not given (km) */
            defaultRadiusKm: z.number().positive().default(0.5),
        })
        .default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
