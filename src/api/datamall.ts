/**
 * LTA DataMall API Client
 * Bus stop list (paginated) and real-time bus arrivals
 *
 * API reference: https://datamall.lta.gov.sg/content/datamall/en/dynamic-data.html
 */

import { Logger } from '@utils/logger';
import { fetchJson } from '@utils/http';
import { requireApiKey } from '@config/index';
import type { AppConfig } from '@config/index';
import { FetchError, FetchErrorKind } from './errors';
import type { BusStop, BusArrival } from '@/types';
import { DataMallBusStopPageSchema, BusArrivalSchema } from '@/types';

/**
 * Account key header per endpoint.
 * Both endpoints document `AccountKey`; they are listed separately so neither
 * relies on the server treating header names case-insensitively.
 */
export const ACCOUNT_KEY_HEADER = {
    busStops: 'AccountKey',
    busArrival: 'AccountKey',
} as const;

/**
 * Fetch every bus stop from the BusStops endpoint.
 *
 * Pages are requested with `$skip` starting at 0 and advanced by the number
 * of stops each page returned; the first empty page ends the listing. Any
 * failing page fails the whole fetch and earlier pages are discarded.
 */
export async function fetchAllBusStops(config: AppConfig): Promise<BusStop[]> {
    const apiKey = requireApiKey(config);
    const { baseUrl, pageTimeoutMs, maxPages } = config.api;
    const headers = { [ACCOUNT_KEY_HEADER.busStops]: apiKey };

    const allStops: BusStop[] = [];
    let skip = 0;

    Logger.info('Fetching bus stops from LTA DataMall API...');

    for (let page = 0; page < maxPages; page++) {
        const url = `${baseUrl}/BusStops?$skip=${skip}`;
        const { value: stops } = await fetchJson(url, DataMallBusStopPageSchema, {
            headers,
            timeoutMs: pageTimeoutMs,
        });

        if (stops.length === 0) {
            Logger.info(`Total bus stops fetched: ${allStops.length}`);
            return dedupeByCode(allStops);
        }

        allStops.push(...stops);
        skip += stops.length;
        Logger.info(`Fetched ${allStops.length} bus stops so far...`);
    }

    throw new FetchError(
        `Bus stop listing did not end within ${maxPages} pages`,
        FetchErrorKind.TOO_MANY_PAGES,
        `${baseUrl}/BusStops`
    );
}

/**
 * Keep the first stop for each code, preserving API order
 */
function dedupeByCode(stops: BusStop[]): BusStop[] {
    const seen = new Set<string>();
    const unique: BusStop[] = [];

    for (const stop of stops) {
        if (seen.has(stop.code)) {
            Logger.warn('Duplicate bus stop code in API response, keeping first', {
                code: stop.code,
            });
            continue;
        }
        seen.add(stop.code);
        unique.push(stop);
    }

    return unique;
}

/**
 * Fetch real-time arrivals for a bus stop
 * @param busStopCode - Stop to query (e.g., "13011")
 * @param serviceNo - Only return this bus service
 */
export async function fetchBusArrivals(
    config: AppConfig,
    busStopCode: string,
    serviceNo?: string
): Promise<BusArrival> {
    const apiKey = requireApiKey(config);
    const params = new URLSearchParams({ BusStopCode: busStopCode });
    if (serviceNo) {
        params.set('ServiceNo', serviceNo);
    }
    const url = `${config.api.baseUrl}/v3/BusArrival?${params.toString()}`;

    Logger.debug('Fetching bus arrivals', { busStopCode, serviceNo });

    const arrival = await fetchJson(url, BusArrivalSchema, {
        headers: { [ACCOUNT_KEY_HEADER.busArrival]: apiKey },
        timeoutMs: config.api.arrivalTimeoutMs,
    });

    Logger.debug(`Bus arrival data retrieved for stop ${busStopCode}`, {
        services: arrival.services.length,
    });
    return arrival;
}
