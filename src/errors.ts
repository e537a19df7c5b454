/** Transport failure or unexpected HTTP status. Retried with backoff, then the page is skipped. */
export class NetworkError extends Error {
    override readonly name = 'NetworkError';

    constructor(
        message: string,
        readonly url: string,
        readonly statusCode: number | null = null,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class RateLimitedError extends Error {
    override readonly name = 'RateLimitedError';

    constructor(readonly url: string) {
        super(`Rate limited by ${url}`);
    }
}

/** Page beyond the last one. The normal end of a category, not a failure. */
export class NotFoundError extends Error {
    override readonly name = 'NotFoundError';

    constructor(readonly url: string) {
        super(`Not found: ${url}`);
    }
}

export class ParseError extends Error {
    override readonly name = 'ParseError';
}

export class MalformedPriceError extends Error {
    override readonly name = 'MalformedPriceError';

    constructor(readonly priceText: string) {
        super(`Unparseable price "${priceText}"`);
    }
}

export class CatalogLoadError extends Error {
    override readonly name = 'CatalogLoadError';
}

export class InputError extends Error {
    override readonly name = 'InputError';
}
