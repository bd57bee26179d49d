import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { ConsoleLogger, createChildLogger, LoggerFactory, LogLevel, parseLogLevel } from './Logger';

describe('Logger', () => {
    let stderr: jest.SpiedFunction<typeof console.error>;

    beforeEach(() => {
        stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('ConsoleLogger', () => {
        it('should write a text line with metadata and cause', () => {
            const logger = new ConsoleLogger('pdfgrab');

            logger.error('Download failed', new Error('HTTP 404 Not Found'), { attempt: 1 });

            expect(stderr).toHaveBeenCalledTimes(1);
            expect(stderr).toHaveBeenCalledWith('[ERROR] [pdfgrab] Download failed {"attempt":1}: HTTP 404 Not Found');
        });

        it('should write one JSON object per line in json mode', () => {
            const logger = new ConsoleLogger('pdfgrab.http', { json: true });

            logger.warn('Slow response', { ms: 1200 });

            const entry: unknown = JSON.parse(String(stderr.mock.calls[0]?.[0]));
            expect(entry).toMatchObject({
                level: 'warn',
                logger: 'pdfgrab.http',
                message: 'Slow response',
                meta: { ms: 1200 }
            });
        });

        it('should drop entries below its level', () => {
            const logger = new ConsoleLogger('pdfgrab', { level: LogLevel.WARN });

            logger.debug('hidden');
            logger.info('hidden');
            logger.warn('shown');

            expect(stderr).toHaveBeenCalledTimes(1);
            expect(stderr).toHaveBeenCalledWith('[WARN] [pdfgrab] shown');
        });

        it('should colour the level tag on request', () => {
            new ConsoleLogger('pdfgrab', { colorize: true }).info('ready');

            expect(stderr).toHaveBeenCalledWith('\x1b[32m[INFO]\x1b[0m [pdfgrab] ready');
        });
    });

    describe('LoggerFactory', () => {
        afterEach(() => {
            LoggerFactory.configure({ level: LogLevel.INFO });
        });

        it('should reconfigure loggers it already handed out', () => {
            const logger = LoggerFactory.getLogger('factory-test');

            LoggerFactory.configure({ level: LogLevel.SILENT });
            logger.error('hidden');

            expect(LoggerFactory.getLogger('factory-test')).toBe(logger);
            expect(logger.level).toBe(LogLevel.SILENT);
            expect(stderr).not.toHaveBeenCalled();
        });

        it('should name child loggers after their parent and keep its level', () => {
            const parent = new ConsoleLogger('pdfgrab', { level: LogLevel.DEBUG });

            const child = createChildLogger(parent, 'engine');
            child.debug('attempt 1/3');

            expect(stderr).toHaveBeenCalledWith('[DEBUG] [pdfgrab.engine] attempt 1/3');
        });
    });

    describe('parseLogLevel', () => {
        it.each([
            ['debug', LogLevel.DEBUG],
            ['INFO', LogLevel.INFO],
            ['warning', LogLevel.WARN],
            [' error ', LogLevel.ERROR],
            ['silent', LogLevel.SILENT]
        ])('should parse %j', (value, level) => {
            expect(parseLogLevel(value)).toBe(level);
        });

        it('should reject unknown names', () => {
            expect(parseLogLevel('loud')).toBeUndefined();
            expect(parseLogLevel('constructor')).toBeUndefined();
        });
    });
});
