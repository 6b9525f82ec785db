import { describe, it, expect } from '@jest/globals';
import { M3u8PlaylistParser } from './M3u8PlaylistParser';
import { ParseError } from '../../shared/errors/AppError';

const parser = new M3u8PlaylistParser();

function parse(lines: string[]) {
    return parser.parse(Buffer.from(lines.join('\n'), 'utf8'));
}

describe('M3u8PlaylistParser', () => {
    it('should read the variants of a master playlist', () => {
        const parsed = parse([
            '#EXTM3U',
            '#EXT-X-STREAM-INF:BANDWIDTH=1280000,RESOLUTION=640x360,FRAME-RATE=25.000',
            'low/index.m3u8',
            '#EXT-X-STREAM-INF:BANDWIDTH=5000000',
            'high/index.m3u8',
            ''
        ]);

        expect(parsed).toEqual({
            kind: 'master',
            variants: [
                { uri: 'low/index.m3u8', bandwidth: 1280000, resolution: { width: 640, height: 360 }, frameRate: 25 },
                { uri: 'high/index.m3u8', bandwidth: 5000000 }
            ]
        });
    });

    it('should read the segments of a media playlist', () => {
        const parsed = parse([
            '#EXTM3U',
            '#EXT-X-TARGETDURATION:10',
            '#EXTINF:9.9,',
            'seg-1.ts',
            '#EXTINF:9.9,',
            'https://cdn.test/seg-2.ts',
            '#EXT-X-ENDLIST',
            ''
        ]);

        expect(parsed).toEqual({
            kind: 'media',
            segments: [{ uri: 'seg-1.ts' }, { uri: 'https://cdn.test/seg-2.ts' }]
        });
    });

    it('should attach keys and init sections to segments', () => {
        const parsed = parse([
            '#EXTM3U',
            '#EXT-X-TARGETDURATION:4',
            '#EXT-X-MAP:URI="init.mp4"',
            '#EXT-X-KEY:METHOD=AES-128,URI="key.bin"',
            '#EXTINF:4.0,',
            'part-1.m4s',
            ''
        ]);

        expect(parsed.kind).toBe('media');
        if (parsed.kind === 'media') {
            expect(parsed.segments[0].uri).toBe('part-1.m4s');
            expect(parsed.segments[0].key).toEqual({ method: 'AES-128', uri: 'key.bin' });
            expect(parsed.segments[0].map).toEqual({ uri: 'init.mp4' });
        }
    });

    it('should accept a leading byte order mark', () => {
        const parsed = parser.parse(Buffer.from('\uFEFF#EXTM3U\n#EXTINF:1,\na.ts\n', 'utf8'));

        expect(parsed).toEqual({ kind: 'media', segments: [{ uri: 'a.ts' }] });
    });

    it('should treat an empty media playlist as having no segments', () => {
        expect(parse(['#EXTM3U', '#EXT-X-ENDLIST', ''])).toEqual({ kind: 'media', segments: [] });
    });

    it('should reject text without the playlist header', () => {
        expect(() => parse(['<!doctype html>', '<html></html>'])).toThrow(ParseError);
        expect(() => parse(['<!doctype html>'])).toThrow('Missing #EXTM3U header');
    });
});
