import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { ConsoleLogger, LoggerFactory, LogLevel, createChildLogger, parseLogLevel } from './Logger';

describe('ConsoleLogger', () => {
    let errorLines: string[];
    let warnLines: string[];

    beforeEach(() => {
        errorLines = [];
        warnLines = [];
        jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
            errorLines.push(args.map(String).join(' '));
        });
        jest.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
            warnLines.push(args.map(String).join(' '));
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
        LoggerFactory.clear();
    });

    it('should write one JSON line per entry in json mode', () => {
        const logger = new ConsoleLogger({ name: 'download', json: true });

        logger.info('Segments downloaded', { total: 3 });

        expect(errorLines).toHaveLength(1);
        const line = JSON.parse(errorLines[0]);
        expect(line).toMatchObject({
            level: 'INFO',
            logger: 'download',
            message: 'Segments downloaded',
            meta: { total: 3 }
        });
    });

    it('should drop entries below its level', () => {
        const logger = new ConsoleLogger({ level: LogLevel.WARN, json: true });

        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');

        expect(errorLines).toHaveLength(1);
        expect(JSON.parse(errorLines[0]).message).toBe('shown');
    });

    it('should print warnings through console.warn in pretty mode', () => {
        const logger = new ConsoleLogger({ name: 'cache', timestamp: false, colorize: false });

        logger.warn('Playlist changed');

        expect(warnLines).toEqual(['[WARN] [cache] Playlist changed']);
    });

    it('should accept level names', () => {
        const logger = new ConsoleLogger();

        logger.setLevel('debug');

        expect(logger.getLevel()).toBe(LogLevel.DEBUG);
        expect(parseLogLevel('nope')).toBeUndefined();
    });
});

describe('LoggerFactory', () => {
    afterEach(() => {
        LoggerFactory.clear();
        LoggerFactory.setDefaultConfig({ level: LogLevel.INFO });
    });

    it('should hand out one logger per name', () => {
        expect(LoggerFactory.getLogger('a')).toBe(LoggerFactory.getLogger('a'));
    });

    it('should raise the level of existing loggers on request', () => {
        const logger = LoggerFactory.getLogger('cli');
        const child = createChildLogger(logger, 'http');

        LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG }, true);

        expect(logger instanceof ConsoleLogger && logger.getLevel()).toBe(LogLevel.DEBUG);
        expect(child instanceof ConsoleLogger && child.name).toBe('cli.http');
        expect(child instanceof ConsoleLogger && child.getLevel()).toBe(LogLevel.DEBUG);
    });
});
