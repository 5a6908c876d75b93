import { describe, it, expect } from 'vitest';
import { distanceKm } from './distance';

describe('distanceKm', () => {
    it('should return 0 for identical points', () => {
        expect(distanceKm(1.3, 103.8, 1.3, 103.8)).toBe(0);
    });

    it('should be symmetric', () => {
        const points: [number, number][] = [
            [1.2834, 103.8607],
            [1.29, 103.85],
            [-33.8688, 151.2093],
            [51.5074, -0.1278],
            [89.9, -179.9],
        ];

        for (const [lat1, lon1] of points) {
            for (const [lat2, lon2] of points) {
                expect(distanceKm(lat1, lon1, lat2, lon2)).toBe(distanceKm(lat2, lon2, lat1, lon1));
            }
        }
    });

    it('should measure Marina Bay to the city centre at about 1.4km', () => {
        const distance = distanceKm(1.2834, 103.8607, 1.29, 103.85);

        expect(Math.abs(distance - 1.3)).toBeLessThanOrEqual(0.1);
        expect(distance).toBeGreaterThan(1.39);
        expect(distance).toBeLessThan(1.41);
    });

    it('should handle international distances', () => {
        // London to New York is approximately 5570km
        const distance = distanceKm(51.5074, -0.1278, 40.7128, -74.006);

        expect(distance).toBeGreaterThan(5560);
        expect(distance).toBeLessThan(5580);
    });

    it('should return half the circumference for antipodal points', () => {
        expect(distanceKm(0, 0, 0, 180)).toBeCloseTo(Math.PI * 6371, 6);
    });
});
