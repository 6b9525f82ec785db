import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { ConfigLoader, ConfigExplorer, Environment, getDefaults } from './ConfigLoader';
import { SilentLogger } from '../../shared/logging/Logger';
import { ConfigurationError } from '../../shared/errors/AppError';

const HOME = '/home/tester';
const PROJECT = '/work/project';

describe('ConfigLoader', () => {
    const search = jest.fn<ConfigExplorer['search']>();
    const explorer: ConfigExplorer = { search };

    const filesIn = (files: Record<string, unknown>) => {
        search.mockImplementation(dir => {
            const location = dir ?? '';
            return location in files ? { config: files[location], filepath: `${location}/.m3u8archiverrc` } : null;
        });
    };

    const loaderWith = (env: Environment = {}): ConfigLoader =>
        new ConfigLoader(new SilentLogger(), explorer, env, HOME, PROJECT);

    beforeEach(() => {
        search.mockReset();
    });

    it('should load defaults when no config files exist', () => {
        filesIn({});

        const config = loaderWith().load();

        expect(config).toEqual({
            concurrency: 10,
            indexName: 'index.m3u8',
            timeout: 30000,
            retries: 3,
            maxRedirects: 8,
            headers: {},
            player: 'auto',
            ffmpegPath: 'ffmpeg',
            verbose: false
        });
        expect(search.mock.calls).toEqual([[HOME], [PROJECT]]);
    });

    it('should let the working directory override the home directory', () => {
        filesIn({
            [HOME]: { concurrency: 4, player: 'mpv' },
            [PROJECT]: { concurrency: 6 }
        });

        const config = loaderWith().load();

        expect(config.concurrency).toBe(6);
        expect(config.player).toBe('mpv');
    });

    it('should let the environment override config files', () => {
        filesIn({ [PROJECT]: { concurrency: 6, verbose: false } });

        const config = loaderWith({
            M3U8_ARCHIVER_CONCURRENCY: '2',
            M3U8_ARCHIVER_VERBOSE: 'true',
            M3U8_ARCHIVER_FFMPEG_PATH: '/opt/bin/ffmpeg'
        }).load();

        expect(config.concurrency).toBe(2);
        expect(config.verbose).toBe(true);
        expect(config.ffmpegPath).toBe('/opt/bin/ffmpeg');
    });

    it('should merge headers from every source', () => {
        filesIn({
            [HOME]: { headers: { Referer: 'https://media.test/' } },
            [PROJECT]: { headers: { Cookie: 'session=test-secret' } }
        });

        const config = loaderWith({ M3U8_ARCHIVER_USER_AGENT: 'archiver-test' }).load();

        expect(config.headers).toEqual({
            Referer: 'https://media.test/',
            Cookie: 'session=test-secret',
            'User-Agent': 'archiver-test'
        });
    });

    it('should read the home directory once when it is the working directory', () => {
        filesIn({});

        new ConfigLoader(new SilentLogger(), explorer, {}, HOME, HOME).load();

        expect(search).toHaveBeenCalledTimes(1);
    });

    it('should reject a field of the wrong type', () => {
        filesIn({ [PROJECT]: { timeout: '30s' } });

        expect(() => loaderWith().load()).toThrow(`'timeout' in ${PROJECT}/.m3u8archiverrc must be a number`);
    });

    it('should reject an unknown player', () => {
        filesIn({});

        expect(() => loaderWith({ M3U8_ARCHIVER_PLAYER: 'vlc' }).load()).toThrow(ConfigurationError);
    });

    it('should reject a non-numeric environment value', () => {
        filesIn({});

        expect(() => loaderWith({ M3U8_ARCHIVER_RETRIES: 'many' }).load()).toThrow(
            "M3U8_ARCHIVER_RETRIES must be a number, got 'many'"
        );
    });

    it('should reject a concurrency below one', () => {
        filesIn({ [HOME]: { concurrency: 0 } });

        expect(() => loaderWith().load()).toThrow('Concurrency must be a positive integer, got 0');
    });

    it('should wrap explorer failures', () => {
        search.mockImplementation(() => {
            throw new Error('Unexpected token } in JSON');
        });

        expect(() => loaderWith().load()).toThrow(ConfigurationError);
    });

    it('should hand out copies of the defaults', () => {
        const defaults = getDefaults();
        defaults.headers.Injected = 'yes';

        expect(getDefaults().headers).toEqual({});
    });
});
