import { cosmiconfigSync } from 'cosmiconfig';
import * as os from 'os';
import { StructureCheckMode } from '../../application/engine/TransferValidator';
import { REQUEST_LIMITS } from '../../domain/entities/DownloadRequest';
import { ConfigurationError } from '../../shared/errors/AppError';
import { Logger, parseLogLevel } from '../../shared/logging/Logger';

export const MODULE_NAME = 'pdfgrab';
export const ENV_PREFIX = 'PDFGRAB_';

export interface AppConfig {
    outputDir: string;
    maxRetries: number;
    /** Base retry delay in seconds */
    retryDelay: number;
    /** Per-attempt timeout in seconds */
    timeout: number;
    logLevel: string;
    logJson: boolean;
    /** Replaces the first entry of the rotation list */
    userAgent?: string;
    structureCheck: StructureCheckMode;
}

export type PartialConfig = Partial<AppConfig>;

/**
 * The part of a cosmiconfig explorer the loader uses
 */
export interface ConfigExplorer {
    search(searchFrom?: string): { config: unknown; filepath: string } | null;
}

export interface ConfigLoaderOptions {
    explorer?: ConfigExplorer;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    homeDir?: string;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
    outputDir: 'downloads',
    maxRetries: REQUEST_LIMITS.maxRetries.default,
    retryDelay: REQUEST_LIMITS.baseRetryDelaySeconds.default,
    timeout: REQUEST_LIMITS.timeoutSeconds.default,
    logLevel: 'info',
    logJson: false,
    structureCheck: 'hard'
};

const NUMERIC_LIMITS = {
    maxRetries: REQUEST_LIMITS.maxRetries,
    retryDelay: REQUEST_LIMITS.baseRetryDelaySeconds,
    timeout: REQUEST_LIMITS.timeoutSeconds
} as const;

type NumericKey = keyof typeof NUMERIC_LIMITS;

const NUMERIC_KEYS: readonly NumericKey[] = ['maxRetries', 'retryDelay', 'timeout'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createExplorer(): ConfigExplorer {
    return cosmiconfigSync(MODULE_NAME, {
        searchPlaces: [
            'package.json',
            `.${MODULE_NAME}rc`,
            `.${MODULE_NAME}rc.json`,
            `${MODULE_NAME}.config.json`,
            `${MODULE_NAME}.config.js`
        ],
        packageProp: MODULE_NAME
    });
}

/* --------------------- Configuration Loader --------------------- */
export class ConfigLoader {
    private config: AppConfig = { ...DEFAULT_CONFIG };
    private readonly explorer: ConfigExplorer;
    private readonly env: NodeJS.ProcessEnv;
    private readonly cwd: string;
    private readonly homeDir: string;

    constructor(
        private logger: Logger,
        options: ConfigLoaderOptions = {}
    ) {
        this.explorer = options.explorer ?? createExplorer();
        this.env = options.env ?? process.env;
        this.cwd = options.cwd ?? process.cwd();
        this.homeDir = options.homeDir ?? os.homedir();
    }

    /**
     * Merge defaults < home directory file < current directory file <
     * environment. Throws ConfigurationError on invalid values.
     */
    load(): AppConfig {
        const homeConfig = this.loadFromDirectory(this.homeDir);
        const localConfig = this.cwd === this.homeDir ? {} : this.loadFromDirectory(this.cwd);
        const envConfig = this.loadFromEnvironment();

        this.config = this.mergeConfigs(DEFAULT_CONFIG, homeConfig, localConfig, envConfig);
        this.logger.debug('Configuration loaded', { ...this.config });
        return this.getConfig();
    }

    /**
     * Get the loaded configuration
     */
    getConfig(): AppConfig {
        return { ...this.config };
    }

    /**
     * Override configuration with command-line arguments
     */
    applyCliOverrides(overrides: PartialConfig): AppConfig {
        const checked = this.validate(overrides, 'command line');
        return this.mergeConfigs(this.config, checked);
    }

    private loadFromDirectory(directory: string): PartialConfig {
        const result = this.explorer.search(directory);
        if (!result) {
            return {};
        }

        if (!isRecord(result.config)) {
            throw new ConfigurationError(`Configuration in ${result.filepath} must be an object`, {
                file: result.filepath
            });
        }

        this.logger.debug(`Loaded config from ${result.filepath}`);
        return this.validate(result.config, result.filepath);
    }

    private loadFromEnvironment(): PartialConfig {
        const raw: Record<string, unknown> = {};
        const read = (name: string): string | undefined => {
            const value = this.env[`${ENV_PREFIX}${name}`];
            return value === undefined || value.trim() === '' ? undefined : value.trim();
        };

        const outputDir = read('OUTPUT_DIR');
        if (outputDir !== undefined) raw.outputDir = outputDir;

        const numeric: Array<[NumericKey, string]> = [
            ['maxRetries', 'MAX_RETRIES'],
            ['retryDelay', 'RETRY_DELAY'],
            ['timeout', 'TIMEOUT']
        ];
        for (const [key, name] of numeric) {
            const value = read(name);
            if (value !== undefined) {
                raw[key] = Number(value);
            }
        }

        const logLevel = read('LOG_LEVEL');
        if (logLevel !== undefined) raw.logLevel = logLevel.toLowerCase();

        const logJson = read('LOG_JSON');
        if (logJson !== undefined) raw.logJson = ['1', 'true', 'yes'].includes(logJson.toLowerCase());

        const userAgent = read('USER_AGENT');
        if (userAgent !== undefined) raw.userAgent = userAgent;

        const structureCheck = read('STRUCTURE_CHECK');
        if (structureCheck !== undefined) raw.structureCheck = structureCheck.toLowerCase();

        return this.validate(raw, 'environment');
    }

    private validate(source: Record<string, unknown>, origin: string): PartialConfig {
        const config: PartialConfig = {};
        const fail = (key: string, expected: string): never => {
            throw new ConfigurationError(
                `Invalid ${key} in ${origin}: expected ${expected}, got ${JSON.stringify(source[key])}`,
                { key, origin }
            );
        };

        if (source.outputDir !== undefined) {
            if (typeof source.outputDir !== 'string' || source.outputDir.trim() === '') {
                fail('outputDir', 'a non-empty string');
            } else {
                config.outputDir = source.outputDir;
            }
        }

        for (const key of NUMERIC_KEYS) {
            const value = source[key];
            if (value === undefined) continue;

            const limits = NUMERIC_LIMITS[key];
            const integer = key === 'maxRetries';
            if (
                typeof value !== 'number' ||
                !Number.isFinite(value) ||
                (integer && !Number.isInteger(value)) ||
                value < limits.min ||
                value > limits.max
            ) {
                fail(key, `${integer ? 'an integer' : 'a number'} between ${limits.min} and ${limits.max}`);
            } else {
                config[key] = value;
            }
        }

        if (source.logLevel !== undefined) {
            if (typeof source.logLevel !== 'string' || parseLogLevel(source.logLevel) === undefined) {
                fail('logLevel', 'one of debug, info, warn, error, silent');
            } else {
                config.logLevel = source.logLevel.toLowerCase();
            }
        }

        if (source.logJson !== undefined) {
            if (typeof source.logJson !== 'boolean') {
                fail('logJson', 'a boolean');
            } else {
                config.logJson = source.logJson;
            }
        }

        if (source.userAgent !== undefined) {
            if (typeof source.userAgent !== 'string' || source.userAgent.trim() === '') {
                fail('userAgent', 'a non-empty string');
            } else {
                config.userAgent = source.userAgent;
            }
        }

        if (source.structureCheck !== undefined) {
            if (source.structureCheck === 'hard' || source.structureCheck === 'soft') {
                config.structureCheck = source.structureCheck;
            } else {
                fail('structureCheck', 'hard or soft');
            }
        }

        return config;
    }

    private mergeConfigs(base: Readonly<AppConfig>, ...overrides: PartialConfig[]): AppConfig {
        const merged: AppConfig = { ...base };

        for (const override of overrides) {
            if (override.outputDir !== undefined) merged.outputDir = override.outputDir;
            if (override.maxRetries !== undefined) merged.maxRetries = override.maxRetries;
            if (override.retryDelay !== undefined) merged.retryDelay = override.retryDelay;
            if (override.timeout !== undefined) merged.timeout = override.timeout;
            if (override.logLevel !== undefined) merged.logLevel = override.logLevel;
            if (override.logJson !== undefined) merged.logJson = override.logJson;
            if (override.userAgent !== undefined) merged.userAgent = override.userAgent;
            if (override.structureCheck !== undefined) merged.structureCheck = override.structureCheck;
        }

        return merged;
    }
}
