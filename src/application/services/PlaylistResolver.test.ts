import { describe, it, expect, beforeEach } from '@jest/globals';
import { createHash } from 'crypto';
import { PlaylistResolver, selectVariant } from './PlaylistResolver';
import { M3u8PlaylistParser } from '../../infrastructure/parsing/M3u8PlaylistParser';
import { FakeFetchClient, mediaPlaylist } from '../../testing/fakes';
import { SilentLogger } from '../../shared/logging/Logger';
import { FetchError, ParseError, ResolutionError } from '../../shared/errors/AppError';

const MASTER_URL = 'https://media.test/live/master.m3u8';

const MASTER = [
    '#EXTM3U',
    '#EXT-X-STREAM-INF:BANDWIDTH=1000,RESOLUTION=1280x720',
    '720/index.m3u8',
    '#EXT-X-STREAM-INF:BANDWIDTH=500,RESOLUTION=1920x1080',
    '1080-low/index.m3u8',
    '#EXT-X-STREAM-INF:BANDWIDTH=2000,RESOLUTION=1920x1080',
    '1080-high/index.m3u8',
    ''
].join('\n');

describe('selectVariant', () => {
    it('should prefer the largest resolution and break ties on bandwidth', () => {
        const chosen = selectVariant([
            { uri: 'a', bandwidth: 1000, resolution: { width: 1280, height: 720 } },
            { uri: 'b', bandwidth: 500, resolution: { width: 1920, height: 1080 } },
            { uri: 'c', bandwidth: 2000, resolution: { width: 1920, height: 1080 } }
        ]);

        expect(chosen?.uri).toBe('c');
    });

    it('should fall back to bandwidth when a variant has no resolution', () => {
        const chosen = selectVariant([
            { uri: 'a', bandwidth: 800, resolution: { width: 1920, height: 1080 } },
            { uri: 'b', bandwidth: 1200 }
        ]);

        expect(chosen?.uri).toBe('b');
    });

    it('should keep the first listed variant on a full tie', () => {
        const chosen = selectVariant([
            { uri: 'first', bandwidth: 700 },
            { uri: 'second', bandwidth: 700 }
        ]);

        expect(chosen?.uri).toBe('first');
    });

    it('should return undefined for no variants', () => {
        expect(selectVariant([])).toBeUndefined();
    });
});

describe('PlaylistResolver', () => {
    let fetchClient: FakeFetchClient;
    let resolver: PlaylistResolver;

    beforeEach(() => {
        fetchClient = new FakeFetchClient();
        resolver = new PlaylistResolver(fetchClient, new M3u8PlaylistParser(), new SilentLogger());
    });

    it('should follow the best variant of a master playlist', async () => {
        const media = mediaPlaylist(['seg-1.ts', 'seg-2.ts']);
        fetchClient
            .respond(MASTER_URL, MASTER)
            .respond('https://media.test/live/1080-high/index.m3u8', media);

        const playlist = await resolver.resolve(MASTER_URL, {});

        expect(fetchClient.calls).toEqual([MASTER_URL, 'https://media.test/live/1080-high/index.m3u8']);
        expect(playlist.baseUrl).toBe('https://media.test/live/1080-high/index.m3u8');
        expect(playlist.segmentUrls()).toEqual([
            'https://media.test/live/1080-high/seg-1.ts',
            'https://media.test/live/1080-high/seg-2.ts'
        ]);
    });

    it('should checksum the raw bytes of the final media playlist', async () => {
        const media = mediaPlaylist(['a.ts']);
        fetchClient.respond('https://media.test/vod.m3u8', media);

        const playlist = await resolver.resolve('https://media.test/vod.m3u8', {});

        expect(playlist.checksum).toBe(createHash('md5').update(Buffer.from(media, 'utf8')).digest('hex'));
        expect(playlist.source).toBe(media);
    });

    it('should send the given headers on every hop', async () => {
        fetchClient
            .respond(MASTER_URL, MASTER)
            .respond('https://media.test/live/1080-high/index.m3u8', mediaPlaylist(['a.ts']));

        await resolver.resolve(MASTER_URL, { Referer: 'https://media.test/' });

        expect(fetchClient.sentHeaders).toEqual([
            { Referer: 'https://media.test/' },
            { Referer: 'https://media.test/' }
        ]);
    });

    it('should stop following master playlists at the redirect limit', async () => {
        const loop = ['#EXTM3U', '#EXT-X-STREAM-INF:BANDWIDTH=100', 'loop.m3u8', ''].join('\n');
        fetchClient.respond('https://media.test/loop.m3u8', loop);

        await expect(resolver.resolve('https://media.test/loop.m3u8', {}, 3)).rejects.toBeInstanceOf(ResolutionError);
        expect(fetchClient.calls).toHaveLength(4);
    });

    it('should refuse a master playlist when no hop is allowed', async () => {
        fetchClient.respond(MASTER_URL, MASTER);

        await expect(resolver.resolve(MASTER_URL, {}, 0)).rejects.toBeInstanceOf(ResolutionError);
        expect(fetchClient.calls).toEqual([MASTER_URL]);
    });

    it('should fail on a master playlist without variants', async () => {
        const audioOnly = [
            '#EXTM3U',
            '#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="aud",NAME="English",URI="audio.m3u8"',
            ''
        ].join('\n');
        fetchClient.respond(MASTER_URL, audioOnly);

        await expect(resolver.resolve(MASTER_URL, {})).rejects.toThrow(
            `Master playlist declares no variant: ${MASTER_URL}`
        );
    });

    it('should propagate fetch failures', async () => {
        await expect(resolver.resolve('https://media.test/missing.m3u8', {})).rejects.toBeInstanceOf(FetchError);
    });

    it('should report unparseable bodies as parse errors', async () => {
        fetchClient.respond('https://media.test/page.m3u8', '<html></html>');

        const failure = resolver.resolve('https://media.test/page.m3u8', {});

        await expect(failure).rejects.toBeInstanceOf(ParseError);
        await expect(failure).rejects.toThrow(
            'Failed to parse playlist at https://media.test/page.m3u8: Missing #EXTM3U header'
        );
    });
});
