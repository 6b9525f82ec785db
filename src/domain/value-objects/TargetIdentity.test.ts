import { describe, it, expect } from '@jest/globals';
import { TargetIdentity } from './TargetIdentity';
import { ValidationError } from '../../shared/errors/AppError';

describe('TargetIdentity', () => {
    it('should accept http and https URLs only', () => {
        expect(new TargetIdentity('https://media.test/live.m3u8').hostname).toBe('media.test');
        expect(() => new TargetIdentity('file:///tmp/live.m3u8')).toThrow(ValidationError);
        expect(() => new TargetIdentity('live.m3u8')).toThrow('Invalid URL: live.m3u8');
    });

    it('should not share its headers with the caller', () => {
        const headers = { Referer: 'https://media.test/' };
        const target = new TargetIdentity('https://media.test/live.m3u8', headers);

        headers.Referer = 'changed';

        expect(target.headers).toEqual({ Referer: 'https://media.test/' });
        expect(Object.isFrozen(target.headers)).toBe(true);
    });

    it('should match a record by checksum', () => {
        const target = new TargetIdentity('https://media.test/live.m3u8').withChecksum('abc');

        expect(target.matches({ target: 'https://other.test/', headers: {}, m3u8_sum: 'abc' })).toBe(true);
        expect(target.matches({ target: 'https://media.test/live.m3u8', headers: {}, m3u8_sum: 'def' })).toBe(false);
    });

    it('should turn into a record once the checksum is known', () => {
        const target = new TargetIdentity('https://media.test/live.m3u8', { Cookie: 'a=b' });

        expect(() => target.toRecord()).toThrow(ValidationError);
        expect(target.withChecksum('abc').toRecord()).toEqual({
            target: 'https://media.test/live.m3u8',
            headers: { Cookie: 'a=b' },
            m3u8_sum: 'abc'
        });
    });
});
