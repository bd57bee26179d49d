import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { DownloadPdfUseCase } from '../../../application/use-cases/DownloadPdfUseCase';
import { AppConfig, ConfigLoader } from '../../config/ConfigLoader';
import { formatOutcome } from '../formatOutcome';
import { Logger, LoggerFactory, LogLevel } from '../../../shared/logging/Logger';

export type UseCaseFactory = (config: AppConfig) => DownloadPdfUseCase;

export class DownloadCommand extends BaseCommand {
    name = 'download';
    positionals = '<url>';
    description = 'Download a PDF with retries, resume and validation';
    aliases = ['dl'];

    constructor(
        logger: Logger,
        private configLoader: ConfigLoader,
        private createUseCase: UseCaseFactory,
        private signal?: AbortSignal
    ) {
        super(logger);
    }

    async execute(args: CommandArgs): Promise<void> {
        try {
            const url = this.getString(args, 'url');
            if (!url) {
                throw new Error('No URL provided. Usage: pdfgrab download <url>');
            }

            if (this.getBoolean(args, 'verbose')) {
                LoggerFactory.configure({ level: LogLevel.DEBUG });
            }

            const config = this.configLoader.applyCliOverrides({
                outputDir: this.getString(args, 'output'),
                maxRetries: this.getNumber(args, 'retries'),
                retryDelay: this.getNumber(args, 'delay'),
                timeout: this.getNumber(args, 'timeout'),
                structureCheck: this.getBoolean(args, 'soft-structure') ? 'soft' : undefined
            });

            const outcome = await this.createUseCase(config).execute({
                url,
                filename: this.getString(args, 'filename'),
                signal: this.signal
            });

            console.log(this.getBoolean(args, 'json') ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome));

            if (!outcome.success) {
                process.exitCode = 1;
            }
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error('Download command failed', error);
            console.error(`\n❌ Error: ${message}`);
            process.exitCode = 1;
        }
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'output',
                alias: 'o',
                description: 'Destination directory',
                type: 'string'
            },
            {
                name: 'filename',
                alias: 'f',
                description: 'File name (".pdf" is appended when missing)',
                type: 'string'
            },
            {
                name: 'retries',
                alias: 'r',
                description: 'Retries after the first attempt (0-10)',
                type: 'number'
            },
            {
                name: 'delay',
                alias: 'd',
                description: 'Base retry delay in seconds (0.1-60)',
                type: 'number'
            },
            {
                name: 'timeout',
                alias: 't',
                description: 'Per-attempt timeout in seconds (5-300)',
                type: 'number'
            },
            {
                name: 'soft-structure',
                description: 'Accept files without a PDF trailer, with a warning',
                type: 'boolean',
                default: false
            },
            {
                name: 'verbose',
                alias: 'v',
                description: 'Enable verbose logging',
                type: 'boolean',
                default: false
            },
            {
                name: 'json',
                description: 'Print the outcome as JSON',
                type: 'boolean',
                default: false
            }
        ];
    }
}
