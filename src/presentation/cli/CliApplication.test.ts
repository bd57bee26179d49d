import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { CliApplication } from './CliApplication';
import { CommandArgs, CommandOption, ICommand } from './commands/ICommand';
import { silentLogger } from '../../shared/logging/Logger';

class RecordingCommand implements ICommand {
    name = 'download';
    positionals = '<url>';
    description = 'Download a document';
    aliases = ['dl'];
    execute = jest.fn<(args: CommandArgs) => Promise<void>>(async () => undefined);

    getOptions(): CommandOption[] {
        return [
            { name: 'retries', alias: 'r', description: 'Retries', type: 'number' },
            { name: 'json', description: 'JSON output', type: 'boolean', default: false }
        ];
    }
}

describe('CliApplication', () => {
    let app: CliApplication;
    let command: RecordingCommand;

    beforeEach(() => {
        app = new CliApplication(silentLogger);
        command = new RecordingCommand();
        app.registerCommand(command);
    });

    it('should register commands', () => {
        expect(app.getCommands()).toEqual([command]);
    });

    it('should run a command by name with its options', async () => {
        await app.run(['node', 'pdfgrab', 'download', 'https://x.test/a.pdf', '-r', '2']);

        expect(command.execute).toHaveBeenCalledTimes(1);
        expect(command.execute.mock.calls[0][0]).toMatchObject({
            url: 'https://x.test/a.pdf',
            retries: 2,
            json: false
        });
    });

    it('should accept the command alias', async () => {
        await app.run(['node', 'pdfgrab', 'dl', 'https://x.test/a.pdf', '--json']);

        expect(command.execute.mock.calls[0][0]).toMatchObject({ url: 'https://x.test/a.pdf', json: true });
    });

    it('should treat a bare URL as the default command', async () => {
        await app.run(['node', 'pdfgrab', 'https://x.test/a.pdf']);

        expect(command.execute.mock.calls[0][0]).toMatchObject({ url: 'https://x.test/a.pdf' });
    });
});
