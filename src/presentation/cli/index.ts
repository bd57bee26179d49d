#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { CliApplication } from './CliApplication';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory, LogLevel, parseLogLevel } from '../../shared/logging/Logger';
import { setupDependencies } from './setup';

async function main(argv: string[] = process.argv): Promise<void> {
    dotenv.config();

    // Load configuration
    const configLoader = new ConfigLoader(LoggerFactory.getLogger('pdfgrab.config'));
    try {
        const config = configLoader.load();
        LoggerFactory.configure({
            level: parseLogLevel(config.logLevel) ?? LogLevel.INFO,
            json: config.logJson,
            colorize: process.stderr.isTTY === true
        });
    } catch (error: unknown) {
        console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
        return;
    }

    const logger = LoggerFactory.getLogger('pdfgrab');

    // Ctrl-C aborts the run; the engine still removes its partial file
    const controller = new AbortController();
    const onInterrupt = () => {
        logger.warn('Interrupted, cancelling download');
        controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
        const { commands } = setupDependencies(configLoader, logger, controller.signal);

        const app = new CliApplication(
            logger,
            'pdfgrab',
            process.env.npm_package_version || '1.0.0'
        );
        commands.forEach(command => app.registerCommand(command));

        await app.run(argv);
    } finally {
        process.removeListener('SIGINT', onInterrupt);
    }
}

// Run if this is the main module
if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('Fatal error:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
}

export { main };
