import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { gotScraping } from 'got-scraping';

import { BACKOFF_BASE_MS, FETCH_HEADERS, REQUEST_TIMEOUT_MS } from './constants.js';
import { NetworkError, NotFoundError, RateLimitedError } from './errors.js';
import type { RequestGate } from './gate.js';
import { buildIndexPageUrl } from './scrapers/bazaraki.js';
import type { Category } from './types.js';

export interface HttpResponse {
    statusCode: number;
    body: string;
}

export type HttpClient = (url: string) => Promise<HttpResponse>;

/** What the pipeline needs from a fetcher; tests substitute an in-memory one. */
export interface PageSource {
    fetchIndexPage: (category: Category, page: number) => Promise<string>;
    fetchDetailPage: (url: string) => Promise<string>;
}

export interface PageFetcherOptions {
    gate: RequestGate;
    maxRetries: number;
    backoffBaseMs?: number;
    http?: HttpClient;
    sleep?: (ms: number) => Promise<void>;
}

const LOG_PREFIX = '[fetcher]';

export const gotScrapingClient: HttpClient = async (url) => {
    const response = await gotScraping({
        url,
        headers: FETCH_HEADERS,
        throwHttpErrors: false,
        retry: { limit: 0 },
        timeout: { request: REQUEST_TIMEOUT_MS },
    });
    const body = typeof response.body === 'string' ? response.body : String(response.body);
    return { statusCode: response.statusCode, body };
};

const toFetchError = (url: string, statusCode: number): Error => {
    if (statusCode === 404 || statusCode === 410) return new NotFoundError(url);
    if (statusCode === 429) return new RateLimitedError(url);
    return new NetworkError(`HTTP ${statusCode} for ${url}`, url, statusCode);
};

const isRetryable = (error: Error): boolean => error instanceof NetworkError || error instanceof RateLimitedError;

export class PageFetcher implements PageSource {
    private readonly gate: RequestGate;
    private readonly maxRetries: number;
    private readonly backoffBaseMs: number;
    private readonly http: HttpClient;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: PageFetcherOptions) {
        this.gate = options.gate;
        this.maxRetries = options.maxRetries;
        this.backoffBaseMs = options.backoffBaseMs ?? BACKOFF_BASE_MS;
        this.http = options.http ?? gotScrapingClient;
        this.sleep =
            options.sleep ??
            (async (ms) => {
                await setTimeout(ms);
            });
    }

    async fetchIndexPage(category: Category, page: number): Promise<string> {
        return this.fetchWithRetry(buildIndexPageUrl(category, page));
    }

    async fetchDetailPage(url: string): Promise<string> {
        return this.fetchWithRetry(url);
    }

    private async fetchOnce(url: string): Promise<string> {
        let response: HttpResponse;
        try {
            response = await this.gate.run(() => this.http(url));
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new NetworkError(`Request to ${url} failed: ${reason}`, url, null, { cause: error });
        }

        if (response.statusCode >= 200 && response.statusCode < 300) return response.body;
        throw toFetchError(url, response.statusCode);
    }

    private async fetchWithRetry(url: string): Promise<string> {
        for (let attempt = 0; ; attempt++) {
            try {
                return await this.fetchOnce(url);
            } catch (error) {
                if (!(error instanceof Error) || !isRetryable(error) || attempt >= this.maxRetries) throw error;

                const backoffMs = this.backoffBaseMs * 2 ** attempt;
                log.warning(
                    `${LOG_PREFIX} ${error.message}, retry ${attempt + 1}/${this.maxRetries} in ${backoffMs} ms`,
                );
                await this.sleep(backoffMs);
            }
        }
    }
}
