import { log } from 'apify';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { NetworkError, NotFoundError, RateLimitedError } from '../errors.js';
import { type HttpClient, type HttpResponse, PageFetcher } from '../fetcher.js';
import { RequestGate } from '../gate.js';

const PAGE_URL = 'https://www.bazaraki.com/electronics/mobile-phones/?page=2';

/** Answers with the given responses in order; an Error is thrown instead of answered. */
const scriptedHttp = (responses: (HttpResponse | Error)[]): HttpClient & { urls: string[] } => {
    const urls: string[] = [];
    const client = async (url: string): Promise<HttpResponse> => {
        urls.push(url);
        const next = responses.shift();
        if (next === undefined) throw new Error('no scripted response left');
        if (next instanceof Error) throw next;
        return next;
    };
    return Object.assign(client, { urls });
};

const createFetcher = (http: HttpClient, maxRetries = 3) => {
    const sleeps: number[] = [];
    const fetcher = new PageFetcher({
        gate: new RequestGate(0),
        maxRetries,
        http,
        sleep: async (ms) => {
            sleeps.push(ms);
        },
    });
    return { fetcher, sleeps };
};

describe('PageFetcher', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    it('should request the category index page', async () => {
        const http = scriptedHttp([{ statusCode: 200, body: '<html></html>' }]);
        const { fetcher, sleeps } = createFetcher(http);

        await expect(fetcher.fetchIndexPage('phones', 2)).resolves.toBe('<html></html>');
        expect(http.urls).toEqual([PAGE_URL]);
        expect(sleeps).toEqual([]);
    });

    it('should raise NotFoundError on 404 without retrying', async () => {
        const http = scriptedHttp([{ statusCode: 404, body: '' }]);
        const { fetcher, sleeps } = createFetcher(http);

        await expect(fetcher.fetchIndexPage('phones', 2)).rejects.toBeInstanceOf(NotFoundError);
        expect(http.urls).toHaveLength(1);
        expect(sleeps).toEqual([]);
    });

    it('should treat 410 as not found', async () => {
        const { fetcher } = createFetcher(scriptedHttp([{ statusCode: 410, body: '' }]));

        await expect(fetcher.fetchDetailPage('https://www.bazaraki.com/adv/1_gone/')).rejects.toBeInstanceOf(
            NotFoundError,
        );
    });

    it('should retry server errors with exponential backoff', async () => {
        const http = scriptedHttp([
            { statusCode: 503, body: '' },
            { statusCode: 502, body: '' },
            { statusCode: 200, body: 'ok' },
        ]);
        const { fetcher, sleeps } = createFetcher(http);

        await expect(fetcher.fetchIndexPage('phones', 2)).resolves.toBe('ok');
        expect(sleeps).toEqual([1000, 2000]);
        expect(log.warning).toHaveBeenNthCalledWith(
            1,
            `[fetcher] HTTP 503 for ${PAGE_URL}, retry 1/3 in 1000 ms`,
        );
    });

    it('should give up after the configured retries', async () => {
        const http = scriptedHttp([
            { statusCode: 500, body: '' },
            { statusCode: 500, body: '' },
            { statusCode: 500, body: '' },
        ]);
        const { fetcher, sleeps } = createFetcher(http, 2);

        const error = await fetcher.fetchIndexPage('phones', 2).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(NetworkError);
        expect(error).toMatchObject({ statusCode: 500, url: PAGE_URL });
        expect(http.urls).toHaveLength(3);
        expect(sleeps).toEqual([1000, 2000]);
    });

    it('should wrap transport failures in NetworkError', async () => {
        const cause = new Error('socket hang up ECONNRESET');
        const { fetcher } = createFetcher(scriptedHttp([cause]), 0);

        const error = await fetcher.fetchIndexPage('phones', 2).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(NetworkError);
        expect(error).toMatchObject({
            statusCode: null,
            message: `Request to ${PAGE_URL} failed: socket hang up ECONNRESET`,
            cause,
        });
    });

    it('should retry rate limiting and surface RateLimitedError when it persists', async () => {
        const http = scriptedHttp([
            { statusCode: 429, body: '' },
            { statusCode: 429, body: '' },
        ]);
        const { fetcher, sleeps } = createFetcher(http, 1);

        await expect(fetcher.fetchIndexPage('phones', 2)).rejects.toBeInstanceOf(RateLimitedError);
        expect(sleeps).toEqual([1000]);
    });
});
