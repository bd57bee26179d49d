import { ICommand, CommandArgs } from './commands/ICommand';
import { Logger } from '../../shared/logging/Logger';
import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: Logger,
        private appName: string = 'pdfgrab',
        private version: string = '1.0.0',
        private defaultCommand: string = 'download'
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(command.name, command);
        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application
     */
    async run(argv: string[] = process.argv): Promise<void> {
        const parser = this.buildParser(hideBin(argv));
        await parser.parseAsync();
    }

    buildParser(args: string[]): Argv {
        const parser = yargs(args)
            .scriptName(this.appName)
            .version(this.version)
            .help()
            .alias('h', 'help')
            .strict()
            .showHelpOnFail(true)
            .wrap(100);

        this.commands.forEach((command, name) => {
            const patterns = [`${name} ${command.positionals}`];
            command.aliases?.forEach(alias => patterns.push(`${alias} ${command.positionals}`));
            // The default command also answers to a bare URL
            if (name === this.defaultCommand) {
                patterns.push(`$0 ${command.positionals}`);
            }

            parser.command(
                patterns,
                command.description,
                (builder: Argv) => this.configureCommand(builder, command),
                async (parsed: CommandArgs) => this.executeCommand(command, parsed)
            );
        });

        return parser;
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        command.getOptions().forEach(option => {
            const config: Options = {
                describe: option.description,
                type: option.type
            };
            if (option.default !== undefined) config.default = option.default;
            if (option.alias) config.alias = option.alias;
            if (option.choices) config.choices = option.choices;

            builder.option(option.name, config);
        });

        return builder;
    }

    private async executeCommand(command: ICommand, args: CommandArgs): Promise<void> {
        this.logger.debug(`Running command '${command.name}'`);
        await command.execute(args);
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}
