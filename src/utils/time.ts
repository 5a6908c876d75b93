/**
 * Time Utilities
 * Arrival time and timestamp formatting
 */

/**
 * Minutes until an ISO-8601 arrival time, with the fraction kept
 * @returns null if the timestamp is empty or unparseable
 */
export function minutesUntil(estimatedArrival: string, now: Date = new Date()): number | null {
    if (!estimatedArrival) {
        return null;
    }
    const arrival = new Date(estimatedArrival);
    if (isNaN(arrival.getTime())) {
        return null;
    }
    return (arrival.getTime() - now.getTime()) / 60000;
}

/**
 * Format an estimated arrival as "Arriving", "N min" or "N/A"
 * @param estimatedArrival - ISO-8601 timestamp; empty when no bus is expected
 */
export function formatArrivalTime(estimatedArrival: string, now: Date = new Date()): string {
    const minutes = minutesUntil(estimatedArrival, now);
    if (minutes === null) {
        return 'N/A';
    }
    return minutes < 1 ? 'Arriving' : `${Math.floor(minutes)} min`;
}

/**
 * Format a Date as "YYYY-MM-DD HH:MM:SS" in local time
 */
export function formatDateTime(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}
