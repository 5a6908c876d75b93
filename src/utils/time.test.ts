import { describe, it, expect } from 'vitest';
import { formatArrivalTime, formatDateTime, minutesUntil } from './time';

describe('time utilities', () => {
    const now = new Date('2026-03-01T08:00:00Z');

    describe('minutesUntil', () => {
        it('should return fractional minutes until the arrival', () => {
            expect(minutesUntil('2026-03-01T16:05:30+08:00', now)).toBe(5.5);
        });

        it('should return null for empty or invalid timestamps', () => {
            expect(minutesUntil('', now)).toBeNull();
            expect(minutesUntil('not a date', now)).toBeNull();
        });
    });

    describe('formatArrivalTime', () => {
        it('should round minutes down', () => {
            expect(formatArrivalTime('2026-03-01T16:05:30+08:00', now)).toBe('5 min');
        });

        it('should show Arriving within the next minute', () => {
            expect(formatArrivalTime('2026-03-01T16:00:30+08:00', now)).toBe('Arriving');
        });

        it('should show Arriving for a bus that is already due', () => {
            expect(formatArrivalTime('2026-03-01T15:58:00+08:00', now)).toBe('Arriving');
        });

        it('should show N/A when no bus is expected', () => {
            expect(formatArrivalTime('', now)).toBe('N/A');
        });
    });

    describe('formatDateTime', () => {
        it('should format local time with zero padding', () => {
            expect(formatDateTime(new Date(2026, 2, 1, 8, 5, 9))).toBe('2026-03-01 08:05:09');
        });
    });
});
