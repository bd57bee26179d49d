import { Logger } from '../../../shared/logging/Logger';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name (e.g., 'download')
     */
    name: string;

    /**
     * Positional arguments in yargs notation, e.g. '<url>'
     */
    positionals: string;

    /**
     * Command description for help text
     */
    description: string;

    /**
     * Command aliases (e.g., ['dl'] for 'download')
     */
    aliases?: string[];

    /**
     * Execute the command
     */
    execute(args: CommandArgs): Promise<void>;

    /**
     * Get command-specific options
     */
    getOptions(): CommandOption[];
}

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    _: Array<string | number>;
    [key: string]: unknown;
}

/**
 * Command option definition
 */
export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean';
    default?: string | number | boolean;
    choices?: string[];
}

/**
 * Base command class with typed accessors over parsed arguments
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract positionals: string;
    abstract description: string;
    aliases?: string[];

    constructor(protected logger: Logger) {}

    abstract execute(args: CommandArgs): Promise<void>;

    abstract getOptions(): CommandOption[];

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = args[name];
        return typeof value === 'string' && value.length > 0 ? value : undefined;
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = args[name];
        return typeof value === 'number' ? value : undefined;
    }

    protected getBoolean(args: CommandArgs, name: string): boolean {
        return args[name] === true;
    }
}
