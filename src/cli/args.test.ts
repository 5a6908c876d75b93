import { describe, it, expect } from 'vitest';
import { parseCliArgs, UsageError } from './args';

describe('parseCliArgs', () => {
    it('should default to a nearby search from the detected location', () => {
        expect(parseCliArgs([])).toEqual({
            command: {
                kind: 'nearby',
                coordinates: undefined,
                radiusKm: undefined,
                limit: undefined,
                gps: false,
            },
            useCache: true,
            debug: false,
        });
    });

    it('should read coordinates, radius and limit', () => {
        const options = parseCliArgs([
            '--lat',
            '1.3',
            '--lon',
            '103.83',
            '--radius',
            '1',
            '--limit',
            '5',
            '--no-cache',
        ]);

        expect(options.command).toEqual({
            kind: 'nearby',
            coordinates: { latitude: 1.3, longitude: 103.83 },
            radiusKm: 1,
            limit: 5,
            gps: false,
        });
        expect(options.useCache).toBe(false);
    });

    it('should accept negative coordinates written with =', () => {
        const { command } = parseCliArgs(['--lat=-1.5', '--lon=-45']);

        expect(command).toMatchObject({
            kind: 'nearby',
            coordinates: { latitude: -1.5, longitude: -45 },
        });
    });

    it('should ask for GPS lookup', () => {
        expect(parseCliArgs(['--gps']).command).toMatchObject({ kind: 'nearby', gps: true });
    });

    it('should parse arrivals with an optional service', () => {
        expect(parseCliArgs(['-b', '13011', '--service', '7']).command).toEqual({
            kind: 'arrivals',
            code: '13011',
            serviceNo: '7',
        });
        expect(parseCliArgs(['--bus-stop', '13011']).command).toEqual({
            kind: 'arrivals',
            code: '13011',
            serviceNo: undefined,
        });
    });

    it('should parse stop and road searches', () => {
        expect(parseCliArgs(['-s', '13011']).command).toEqual({
            kind: 'search-stop',
            code: '13011',
        });
        expect(parseCliArgs(['--search-road', 'Orchard']).command).toEqual({
            kind: 'search-road',
            roadName: 'Orchard',
        });
    });

    it('should parse cache maintenance commands', () => {
        expect(parseCliArgs(['--clear-cache']).command).toEqual({ kind: 'clear-cache' });
        expect(parseCliArgs(['--cache-info']).command).toEqual({ kind: 'cache-info' });
    });

    it('should let help win over other commands', () => {
        expect(parseCliArgs(['-s', '13011', '--help']).command).toEqual({ kind: 'help' });
    });

    it('should prefer a stop search over arrivals', () => {
        expect(parseCliArgs(['-b', '13011', '-s', '02049']).command).toEqual({
            kind: 'search-stop',
            code: '02049',
        });
    });

    it('should turn on debug logging', () => {
        expect(parseCliArgs(['--debug']).debug).toBe(true);
    });

    it('should require latitude and longitude together', () => {
        expect(() => parseCliArgs(['--lat', '1.3'])).toThrow(
            '--lat and --lon must be given together'
        );
    });

    it('should reject values that are not numbers', () => {
        expect(() => parseCliArgs(['--radius', 'wide'])).toThrow('--radius must be a number');
    });

    it('should reject a radius that is not positive', () => {
        expect(() => parseCliArgs(['--radius', '0'])).toThrow('--radius must be positive');
    });

    it('should reject unknown options', () => {
        expect(() => parseCliArgs(['--verbose'])).toThrow(UsageError);
    });

    it('should reject positional arguments', () => {
        expect(() => parseCliArgs(['13011'])).toThrow(UsageError);
    });
});
