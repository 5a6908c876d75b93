/**
 * Bus Stop Finder
 * Command line entry point: parse arguments, load configuration once, run one command
 */

import { loadConfig, maskApiKey, ConfigError } from '@/config';
import type { AppConfig } from '@/config';
import { Logger } from '@/utils/logger';
import { parseCliArgs, UsageError, USAGE } from '@/cli/args';
import type { CliOptions } from '@/cli/args';
import { runCli, ExitCode } from '@/cli/run';
import type { ExitCodeType } from '@/cli/run';

async function main(argv: readonly string[]): Promise<ExitCodeType> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        if (error instanceof UsageError) {
            process.stderr.write(`${error.message}\n\n${USAGE}`);
            return ExitCode.FAILURE;
        }
        throw error;
    }

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            Logger.error(`Error: ${error.getUserMessage()}`);
            return ExitCode.FAILURE;
        }
        throw error;
    }

    Logger.setDebugMode(options.debug || config.debug);
    Logger.info('Starting nearby bus stops finder...');
    if (config.api.apiKey) {
        Logger.info(`Using API key: ${maskApiKey(config.api.apiKey)}`);
    }

    return runCli(options, {
        config,
        write: text => process.stdout.write(`${text}\n`),
    });
}

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        Logger.error('Unexpected error', error);
        process.exitCode = ExitCode.FAILURE;
    });
