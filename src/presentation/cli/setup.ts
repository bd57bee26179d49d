import { ICommand } from './commands/ICommand';
import { DownloadCommand } from './commands/DownloadCommand';
import { DownloadEngine } from '../../application/engine/DownloadEngine';
import { TransferValidator } from '../../application/engine/TransferValidator';
import { createDownloadPdfUseCase, DownloadPdfUseCase } from '../../application/use-cases/DownloadPdfUseCase';
import { DEFAULT_USER_AGENTS, HttpClient } from '../../infrastructure/http/HttpClient';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { createChildLogger, Logger } from '../../shared/logging/Logger';
import { AppConfig, ConfigLoader } from '../config/ConfigLoader';

export interface Dependencies {
    commands: ICommand[];
}

/**
 * Rotation list with the configured identification first
 */
export function userAgentsFor(config: AppConfig): readonly string[] {
    return config.userAgent
        ? [config.userAgent, ...DEFAULT_USER_AGENTS.slice(1)]
        : DEFAULT_USER_AGENTS;
}

/**
 * Wire the engine and its collaborators for one effective configuration
 */
export function createUseCase(config: AppConfig, logger: Logger): DownloadPdfUseCase {
    const storage = new LocalFileStorage(createChildLogger(logger, 'storage'));
    const transport = new HttpClient(createChildLogger(logger, 'http'));

    const engine = new DownloadEngine({
        transport,
        storage,
        logger: createChildLogger(logger, 'engine'),
        userAgents: userAgentsFor(config),
        validator: new TransferValidator(storage, createChildLogger(logger, 'validator'), config.structureCheck)
    });

    return createDownloadPdfUseCase(
        engine,
        storage,
        {
            outputDir: config.outputDir,
            maxRetries: config.maxRetries,
            retryDelay: config.retryDelay,
            timeout: config.timeout
        },
        logger
    );
}

/**
 * Set up all dependencies using manual dependency injection
 */
export function setupDependencies(
    configLoader: ConfigLoader,
    logger: Logger,
    signal?: AbortSignal
): Dependencies {
    const commands: ICommand[] = [
        new DownloadCommand(logger, configLoader, config => createUseCase(config, logger), signal)
    ];

    return { commands };
}
