/**
 * Command Runner
 * Executes one parsed command and maps failures to exit codes
 */

import { Logger } from '@utils/logger';
import { ConfigError } from '@config/index';
import type { AppConfig } from '@config/index';
import { FetchError } from '@api/index';
import { BusStopService, GeolocationService } from '@core/index';
import type { LocationProvider } from '@core/index';
import {
    renderArrivals,
    renderCacheInfo,
    renderNearbyStops,
    renderRoadSearch,
    renderStopDetails,
} from '@/ui';
import type { Location } from '@/types';
import { USAGE } from './args';
import type { CliOptions, Command } from './args';

export const ExitCode = {
    OK: 0,
    FAILURE: 1,
} as const;
export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

export interface RunContext {
    config: AppConfig;
    /** Where results go (stdout in the real CLI) */
    write: (text: string) => void;
    service?: BusStopService;
    /** Override provider selection, for tests */
    providers?: LocationProvider[];
}

interface ExecuteContext extends RunContext {
    service: BusStopService;
}

async function execute(
    command: Command,
    useCache: boolean,
    context: ExecuteContext
): Promise<void> {
    const { config, service, write } = context;

    switch (command.kind) {
        case 'help':
            write(USAGE);
            return;

        case 'clear-cache': {
            const removed = await service.clearCache();
            write(removed ? '\nBus stop cache cleared.\n' : '\nNo bus stop cache to clear.\n');
            return;
        }

        case 'cache-info': {
            write(renderCacheInfo(await service.describeCache(), service.cachePath));
            return;
        }

        case 'search-stop': {
            Logger.info(`Searching for bus stop: ${command.code}`);
            write(renderStopDetails(await service.findByCode(command.code, { useCache })));
            return;
        }

        case 'search-road': {
            Logger.info(`Searching for bus stops on: ${command.roadName}`);
            const stops = await service.searchByRoad(command.roadName, { useCache });
            write(renderRoadSearch(command.roadName, stops));
            return;
        }

        case 'arrivals': {
            Logger.info(`Fetching bus arrivals for bus stop: ${command.code}`);
            const arrival = await service.getArrivals(command.code, command.serviceNo);
            const stop = await service.describeStop(arrival.busStopCode || command.code);
            write(renderArrivals(arrival, stop));
            return;
        }

        case 'nearby': {
            let location: Location;
            if (command.coordinates) {
                const { latitude, longitude } = command.coordinates;
                Logger.info(`Using provided coordinates: (${latitude}, ${longitude})`);
                location = GeolocationService.fromCoordinates(command.coordinates);
            } else {
                const providers =
                    context.providers ??
                    GeolocationService.selectProviders(config, { gps: command.gps });
                location = await GeolocationService.resolveLocation(providers, config);
            }

            const radiusKm = command.radiusKm ?? config.search.defaultRadiusKm;
            const nearby = await service.findNearby(location.coordinates, radiusKm, {
                useCache,
                limit: command.limit,
            });
            write(renderNearbyStops(nearby, location));
            return;
        }
    }
}

/**
 * Run a command
 * @returns Process exit code
 */
export async function runCli(options: CliOptions, context: RunContext): Promise<ExitCodeType> {
    const service = context.service ?? new BusStopService(context.config);

    try {
        await execute(options.command, options.useCache, { ...context, service });
        return ExitCode.OK;
    } catch (error) {
        if (error instanceof ConfigError || error instanceof FetchError) {
            Logger.error(`Error: ${error.getUserMessage()}`);
            Logger.debug('Error details', { message: error.message, cause: error.cause });
            return ExitCode.FAILURE;
        }
        throw error;
    }
}
