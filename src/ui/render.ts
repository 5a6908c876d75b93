/**
 * Terminal Rendering Functions
 * Fixed-width tables for stop details, search results and arrivals.
 * Each function returns the text; the caller decides where it goes.
 */

import { formatArrivalTime, formatDateTime } from '@utils/time';
import type { CacheInfo } from '@core/bus-stops';
import type { BusArrival, BusLoad, BusStop, Location, NearbyBusStop } from '@/types';

const LOAD_LABELS: Record<BusLoad, string> = {
    SEA: '🟢 Seats',
    SDA: '🟡 Standing',
    LSD: '🔴 Limited',
};

/**
 * Column cell: truncated to `width - 1` characters and padded to `width`
 */
function cell(value: string | number, width: number): string {
    return String(value).slice(0, width - 1).padEnd(width);
}

function rule(char: string, width: number): string {
    return char.repeat(width);
}

/**
 * Convert a bus load code to a label
 */
export function getLoadIndicator(load: BusLoad | undefined): string {
    return load ? LOAD_LABELS[load] : 'N/A';
}

/**
 * Details for a single bus stop
 */
export function renderStopDetails(stop: BusStop | undefined): string {
    if (!stop) {
        return '\nBus stop not found.\n';
    }

    return [
        '',
        rule('=', 80),
        'Bus Stop Details',
        rule('=', 80),
        `Code:        ${stop.code}`,
        `Description: ${stop.description}`,
        `Road Name:   ${stop.roadName}`,
        `Latitude:    ${stop.latitude}`,
        `Longitude:   ${stop.longitude}`,
        rule('=', 80),
        '',
    ].join('\n');
}

/**
 * Stops found on a road
 */
export function renderRoadSearch(roadName: string, stops: readonly BusStop[]): string {
    if (stops.length === 0) {
        return `\nNo bus stops found on '${roadName}'.\n`;
    }

    return [
        '',
        rule('=', 80),
        `Bus Stops on '${roadName}' (${stops.length} found)`,
        rule('=', 80),
        `${cell('Code', 9)}${cell('Description', 51)}${cell('Road Name', 21)}`.trimEnd(),
        rule('-', 80),
        ...stops.map(stop =>
            `${cell(stop.code, 9)}${cell(stop.description, 51)}${cell(stop.roadName, 21)}`.trimEnd()
        ),
        rule('=', 80),
        '',
        `Total: ${stops.length} bus stops found`,
        '',
    ].join('\n');
}

function describeLocation(location: Location): string {
    const { latitude, longitude } = location.coordinates;
    const place = location.label ? `${location.label} ` : '';
    return `Near ${place}(${latitude}, ${longitude}) [${location.source}]`;
}

/**
 * Stops near a location, with distances in meters
 */
export function renderNearbyStops(stops: readonly NearbyBusStop[], location?: Location): string {
    if (stops.length === 0) {
        return '\nNo bus stops found in the specified area.\n';
    }

    return [
        '',
        ...(location ? [describeLocation(location)] : []),
        rule('=', 80),
        `${cell('Code', 9)}${cell('Road Name', 26)}${cell('Description', 31)}Distance (m)`,
        rule('=', 80),
        ...stops.map(
            stop =>
                `${cell(stop.code, 9)}${cell(stop.roadName, 26)}${cell(stop.description, 31)}${stop.distanceMeters}`
        ),
        rule('=', 80),
        '',
        `Total: ${stops.length} bus stops found`,
        '',
    ].join('\n');
}

/**
 * Arrival board for a stop
 * @param stop - Stop details for the header, when known
 */
export function renderArrivals(
    arrival: BusArrival,
    stop?: BusStop,
    now: Date = new Date()
): string {
    const code = arrival.busStopCode;
    if (arrival.services.length === 0) {
        return `\nNo buses currently serving bus stop ${code}\n`;
    }

    let header = `Bus Stop: ${code}`;
    if (stop) {
        header += ` - ${stop.description}`;
        if (stop.roadName) {
            header += ` (${stop.roadName})`;
        }
    }

    const rows = arrival.services.map(service => {
        const [next, second, third] = service.nextBuses;
        return [
            cell(service.serviceNo, 9),
            cell(formatArrivalTime(next?.estimatedArrival ?? '', now), 13),
            cell(getLoadIndicator(next?.load), 19),
            cell(formatArrivalTime(second?.estimatedArrival ?? '', now), 13),
            formatArrivalTime(third?.estimatedArrival ?? '', now),
        ].join('');
    });

    return [
        '',
        rule('=', 90),
        header,
        rule('=', 90),
        `${cell('Bus', 9)}${cell('Next Bus', 13)}${cell('Load', 19)}${cell('2nd Bus', 13)}3rd Bus`,
        rule('-', 90),
        ...rows,
        rule('=', 90),
        '',
        `Total: ${arrival.services.length} bus services`,
        `Legend: ${LOAD_LABELS.SEA} Available | ${LOAD_LABELS.SDA} Available | ${LOAD_LABELS.LSD} Standing`,
        '',
    ].join('\n');
}

/**
 * Summary of the bus stop cache
 */
export function renderCacheInfo(info: CacheInfo | null, path: string): string {
    if (!info) {
        return `\nNo usable bus stop cache at ${path}\n`;
    }

    return [
        '',
        `Cache file:  ${info.path}`,
        `Cached at:   ${formatDateTime(info.cachedAt)}`,
        `Expires at:  ${formatDateTime(info.expiresAt)}`,
        `Bus stops:   ${info.totalStops}`,
        `Status:      ${info.valid ? 'valid' : 'expired'}`,
        '',
    ].join('\n');
}
