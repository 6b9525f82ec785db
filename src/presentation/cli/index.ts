#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { CliApplication } from './CliApplication';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory, LogLevel } from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { setupDependencies } from './setup';

const enableDebugLogging = (): void => LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG }, true);

async function main(argv: string[] = process.argv): Promise<number> {
    // .env feeds the M3U8_ARCHIVER_* variables
    dotenv.config();

    const logger = LoggerFactory.getLogger('m3u8-archiver');
    const errorHandler = new ErrorHandler(logger);

    try {
        const configLoader = new ConfigLoader(logger);
        const config = configLoader.load();
        if (config.verbose) {
            enableDebugLogging();
        }

        const { commands } = setupDependencies(config, logger);

        const app = new CliApplication(
            logger,
            'm3u8-archiver',
            process.env.npm_package_version || '1.0.0',
            enableDebugLogging
        );
        commands.forEach(command => app.registerCommand(command));

        await app.run(argv);
        return 0;
    } catch (error) {
        const response = errorHandler.handle(error);
        console.error(`\n❌ ${response.message}`);
        return 1;
    }
}

// Run if this is the main module
if (require.main === module) {
    void main().then(code => {
        process.exitCode = code;
    });
}

export { main };
