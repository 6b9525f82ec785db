import { describe, it, expect, jest } from '@jest/globals';
import { Response } from 'node-fetch';
import { HttpClient, Fetcher } from './HttpClient';
import { SilentLogger } from '../../shared/logging/Logger';
import { FetchError } from '../../shared/errors/AppError';

const URL_UNDER_TEST = 'https://media.test/live/seg-1.ts';

function respond(body: string, status = 200, statusText = 'OK'): Promise<Response> {
    return Promise.resolve(new Response(body, { status, statusText }));
}

function clientWith(fetcher: Fetcher, retries = 2): HttpClient {
    return new HttpClient(new SilentLogger(), { retries, retryDelay: 0, timeout: 5000 }, fetcher);
}

describe('HttpClient', () => {
    it('should return the body and send exactly the given headers', async () => {
        const fetcher = jest.fn<Fetcher>(() => respond('segment'));

        const bytes = await clientWith(fetcher).fetchBytes(URL_UNDER_TEST, { Referer: 'https://media.test/' });

        expect(bytes.toString('utf8')).toBe('segment');
        expect(fetcher).toHaveBeenCalledTimes(1);
        expect(fetcher.mock.calls[0]).toEqual([
            URL_UNDER_TEST,
            { method: 'GET', headers: { Referer: 'https://media.test/' }, timeout: 5000 }
        ]);
    });

    it('should retry a server error and return the later success', async () => {
        const fetcher = jest.fn<Fetcher>()
            .mockImplementationOnce(() => respond('', 503, 'Service Unavailable'))
            .mockImplementationOnce(() => respond('segment'));

        const bytes = await clientWith(fetcher).fetchBytes(URL_UNDER_TEST, {});

        expect(bytes.toString('utf8')).toBe('segment');
        expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('should fail at once on a client error', async () => {
        const fetcher = jest.fn<Fetcher>(() => respond('', 404, 'Not Found'));

        const failure = clientWith(fetcher).fetchBytes(URL_UNDER_TEST, {});

        await expect(failure).rejects.toThrow(`HTTP 404 Not Found for ${URL_UNDER_TEST}`);
        await expect(failure).rejects.toMatchObject({ status: 404, url: URL_UNDER_TEST });
        expect(fetcher).toHaveBeenCalledTimes(1);
    });

    it('should give up on a persistent server error with its status', async () => {
        const fetcher = jest.fn<Fetcher>(() => respond('', 500, 'Internal Server Error'));

        const failure = clientWith(fetcher, 2).fetchBytes(URL_UNDER_TEST, {});

        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toMatchObject({ status: 500 });
        expect(fetcher).toHaveBeenCalledTimes(3);
    });

    it('should give up after repeated network errors', async () => {
        const fetcher = jest.fn<Fetcher>(() => Promise.reject(new Error('ECONNRESET')));

        await expect(clientWith(fetcher, 2).fetchBytes(URL_UNDER_TEST, {})).rejects.toThrow(
            `Request to ${URL_UNDER_TEST} failed after 2 retries: ECONNRESET`
        );
        expect(fetcher).toHaveBeenCalledTimes(3);
    });

});
