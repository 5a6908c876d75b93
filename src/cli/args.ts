/**
 * Command Line Arguments
 * Parses argv into a single command to run
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { Coordinates } from '@/types';

export const USAGE = `Usage: bus-stop-finder [options]

Find nearby bus stops in Singapore and check real-time arrivals.

Options:
  -b, --bus-stop <code>     Check arrivals at a bus stop (e.g. 13011)
      --service <no>        With --bus-stop, only show this bus service
  -s, --search-stop <code>  Show details for a bus stop
  -r, --search-road <text>  Find bus stops on a road (e.g. "Orchard")
      --lat <degrees>       Latitude of the location (use --lat=-1.5 for negatives)
      --lon <degrees>       Longitude of the location
      --radius <km>         Search radius in kilometers (default: 0.5)
      --limit <n>           Show only the nearest n stops
      --no-cache            Fetch fresh bus stop data instead of using the cache
      --gps                 Use several location services for a better position
      --clear-cache         Delete the cached bus stop list
      --cache-info          Show the state of the cached bus stop list
      --debug               Verbose logging
  -h, --help                Show this help

Examples:
  bus-stop-finder                            # Use current location (IP-based)
  bus-stop-finder --bus-stop 13011           # Check arrivals at stop 13011
  bus-stop-finder --search-stop 13011        # Show details for stop 13011
  bus-stop-finder --search-road "Orchard"    # Find all stops on Orchard Road
  bus-stop-finder --lat 1.2834 --lon 103.8607
  bus-stop-finder --radius 1.0 --gps
`;

export type Command =
    | { kind: 'help' }
    | { kind: 'clear-cache' }
    | { kind: 'cache-info' }
    | { kind: 'search-stop'; code: string }
    | { kind: 'search-road'; roadName: string }
    | { kind: 'arrivals'; code: string; serviceNo?: string }
    | {
          kind: 'nearby';
          coordinates?: Coordinates;
          radiusKm?: number;
          limit?: number;
          gps: boolean;
      };

export interface CliOptions {
    command: Command;
    useCache: boolean;
    debug: boolean;
}

/**
 * Invalid command line; reported with the usage text
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

const numberArg = (name: string) =>
    z
        .string()
        .trim()
        .min(1, `--${name} needs a value`)
        .transform(Number)
        .pipe(z.number({ invalid_type_error: `--${name} must be a number` }).finite());

const nonEmpty = (name: string) => z.string().trim().min(1, `--${name} needs a value`);

const ArgsSchema = z
    .object({
        'bus-stop': nonEmpty('bus-stop').optional(),
        service: nonEmpty('service').optional(),
        'search-stop': nonEmpty('search-stop').optional(),
        'search-road': nonEmpty('search-road').optional(),
        lat: numberArg('lat').pipe(z.number().min(-90).max(90)).optional(),
        lon: numberArg('lon').pipe(z.number().min(-180).max(180)).optional(),
        radius: numberArg('radius').pipe(z.number().positive('--radius must be positive')).optional(),
        limit: numberArg('limit')
            .pipe(z.number().int().positive('--limit must be a positive integer'))
            .optional(),
        'no-cache': z.boolean().default(false),
        gps: z.boolean().default(false),
        'clear-cache': z.boolean().default(false),
        'cache-info': z.boolean().default(false),
        debug: z.boolean().default(false),
        help: z.boolean().default(false),
    })
    .refine(args => (args.lat === undefined) === (args.lon === undefined), {
        message: '--lat and --lon must be given together',
    });

type ParsedArgs = z.output<typeof ArgsSchema>;

function toCommand(args: ParsedArgs): Command {
    if (args.help) return { kind: 'help' };
    if (args['clear-cache']) return { kind: 'clear-cache' };
    if (args['cache-info']) return { kind: 'cache-info' };
    if (args['search-stop']) return { kind: 'search-stop', code: args['search-stop'] };
    if (args['search-road']) return { kind: 'search-road', roadName: args['search-road'] };
    if (args['bus-stop']) {
        return { kind: 'arrivals', code: args['bus-stop'], serviceNo: args.service };
    }

    const coordinates =
        args.lat !== undefined && args.lon !== undefined
            ? { latitude: args.lat, longitude: args.lon }
            : undefined;
    return {
        kind: 'nearby',
        coordinates,
        radiusKm: args.radius,
        limit: args.limit,
        gps: args.gps,
    };
}

function readArgs(argv: readonly string[]) {
    try {
        return parseArgs({
            args: [...argv],
            strict: true,
            allowPositionals: false,
            options: {
                'bus-stop': { type: 'string', short: 'b' },
                service: { type: 'string' },
                'search-stop': { type: 'string', short: 's' },
                'search-road': { type: 'string', short: 'r' },
                lat: { type: 'string' },
                lon: { type: 'string' },
                radius: { type: 'string' },
                limit: { type: 'string' },
                'no-cache': { type: 'boolean' },
                gps: { type: 'boolean' },
                'clear-cache': { type: 'boolean' },
                'cache-info': { type: 'boolean' },
                debug: { type: 'boolean' },
                help: { type: 'boolean', short: 'h' },
            },
        }).values;
    } catch (error) {
        throw new UsageError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Parse command line arguments (without the node and script entries)
 * @throws UsageError for unknown options or invalid values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const result = ArgsSchema.safeParse(readArgs(argv));
    if (!result.success) {
        throw new UsageError(result.error.issues.map(issue => issue.message).join('; '));
    }

    return {
        command: toCommand(result.data),
        useCache: !result.data['no-cache'],
        debug: result.data.debug,
    };
}
