import nodeFetch, { RequestInit, Response } from 'node-fetch';
import { IFetchClient } from '../../domain/interfaces/IFetchClient';
import { ILogger } from '../../shared/logging/Logger';
import { FetchError } from '../../shared/errors/AppError';

export interface HttpClientConfig {
    timeout?: number;
    retries?: number;
    retryDelay?: number;
    maxRetryDelay?: number;
    backoffFactor?: number;
}

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Fetch collaborator over node-fetch. Owns the whole retry policy:
 * network errors and retryable statuses are retried with exponential
 * backoff, anything else fails at once.
 */
export class HttpClient implements IFetchClient {
    private config: Required<HttpClientConfig>;

    constructor(
        private logger: ILogger,
        config: HttpClientConfig = {},
        private fetcher: Fetcher = nodeFetch
    ) {
        this.config = {
            timeout: 30000,
            retries: 3,
            retryDelay: 1000,
            maxRetryDelay: 30000,
            backoffFactor: 2,
            ...config
        };
    }

    async fetchBytes(url: string, headers: Readonly<Record<string, string>>): Promise<Buffer> {
        const response = await this.executeWithRetry(url, {
            method: 'GET',
            headers: { ...headers },
            timeout: this.config.timeout
        });

        if (!response.ok) {
            throw new FetchError(
                `HTTP ${response.status} ${response.statusText} for ${url}`,
                url,
                response.status
            );
        }

        try {
            return Buffer.from(await response.arrayBuffer());
        } catch (error) {
            throw new FetchError(`Failed to read response body from ${url}: ${messageOf(error)}`, url);
        }
    }

    private async executeWithRetry(url: string, options: RequestInit): Promise<Response> {
        const maxRetries = this.config.retries;
        let lastError = '';
        let delay = this.config.retryDelay;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            try {
                this.logger.debug(`HTTP ${options.method} ${url} (attempt ${attempt + 1})`);

                const response = await this.fetcher(url, options);

                if (!this.shouldRetryResponse(response) || attempt === maxRetries) {
                    return response;
                }
                lastError = `HTTP ${response.status}: ${response.statusText}`;
            } catch (error) {
                lastError = messageOf(error);
            }

            if (attempt < maxRetries) {
                this.logger.warn(
                    `Request failed, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries}): ${lastError}`,
                    { url }
                );

                await this.sleep(delay);

                // Exponential backoff
                delay = Math.min(
                    delay * this.config.backoffFactor,
                    this.config.maxRetryDelay
                );
            }
        }

        throw new FetchError(
            `Request to ${url} failed after ${maxRetries} retries: ${lastError}`,
            url
        );
    }

    private shouldRetryResponse(response: Response): boolean {
        return (
            response.status >= 500 ||
            response.status === 429 || // Too Many Requests
            response.status === 408 || // Request Timeout
            response.status === 423    // Locked (rate limited)
        );
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
