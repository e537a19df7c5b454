import { log } from 'apify';
import { load } from 'cheerio';

import { detectCondition } from '../classifier.js';
import { BASE_URL, CATEGORY_PATHS } from '../constants.js';
import { MalformedPriceError, ParseError } from '../errors.js';
import type { Category, Listing, ListingDetail } from '../types.js';
import { canonicalizeUrl, normalizeWhitespace, parsePrice } from '../utils.js';

const SOURCE = 'bazaraki' as const;
const LOG_PREFIX = `[${SOURCE}]`;

// Comma-separated selectors are tried together; the first match in document order wins.
const INDEX_SELECTORS = {
    card: 'li.announcement-container, div.announcement-container',
    link: 'a.announcement-block__title, a[href*="/adv/"]',
    price: '.announcement-block__price',
    location: '.announcement-block__location',
    date: '.announcement-block__date',
};

const DETAIL_SELECTORS = {
    description: '.js-description, .announcement-description',
    seller: '.author-name, .announcement__author-name',
    date: '.date-meta',
    characteristic: '.chars-column li',
    characteristicKey: '.key-chars',
    characteristicValue: '.value-chars',
};

export type ExtractSkipReason = 'parse-error' | 'malformed-price';

export interface ExtractOptions {
    category: Category;
    pageUrl: string;
    onSkip?: (reason: ExtractSkipReason) => void;
    /** Called once with the number of cards on the page, readable or not. */
    onCards?: (count: number) => void;
}

export const buildIndexPageUrl = (category: Category, page: number): string =>
    `${BASE_URL}${CATEGORY_PATHS[category]}?page=${page}`;

const textOrNull = (value: string | undefined): string | null => {
    const text = normalizeWhitespace(value ?? '');
    return text.length > 0 ? text : null;
};

/**
 * Yields the listings of one index page. A card that cannot be read is logged and skipped;
 * the remaining cards are still extracted.
 */
export function* extractListings(
    html: string,
    { category, pageUrl, onSkip, onCards }: ExtractOptions,
): Generator<Listing> {
    const $ = load(html);
    const cards = $(INDEX_SELECTORS.card).toArray();
    onCards?.(cards.length);

    for (const [index, card] of cards.entries()) {
        const $card = $(card);
        let listing: Listing;

        try {
            const $link = $card.find(INDEX_SELECTORS.link).first();
            const title = normalizeWhitespace($link.text());
            if (!title) throw new ParseError('missing title');

            const href = $link.attr('href');
            const url = href ? canonicalizeUrl(href, pageUrl) : null;
            if (!url) throw new ParseError(`missing or invalid link "${href ?? ''}"`);

            const priceText = normalizeWhitespace($card.find(INDEX_SELECTORS.price).first().text());
            const price = parsePrice(priceText);
            if (price === null) throw new MalformedPriceError(priceText);

            const $date = $card.find(INDEX_SELECTORS.date).first();

            listing = {
                url,
                category,
                title,
                price,
                currency: 'EUR',
                location: normalizeWhitespace($card.find(INDEX_SELECTORS.location).first().text()),
                conditionHint: null,
                postedAt: textOrNull($date.attr('datetime') ?? $date.text()),
                description: null,
                sellerName: null,
            };
        } catch (error) {
            if (!(error instanceof ParseError) && !(error instanceof MalformedPriceError)) throw error;
            log.warning(`${LOG_PREFIX} Skipping card ${index + 1} on ${pageUrl}: ${error.message}`);
            onSkip?.(error instanceof MalformedPriceError ? 'malformed-price' : 'parse-error');
            continue;
        }

        yield listing;
    }
}

export const extractListingDetail = (html: string): ListingDetail => {
    const $ = load(html);

    let conditionHint: ListingDetail['conditionHint'] = null;
    for (const item of $(DETAIL_SELECTORS.characteristic).toArray()) {
        const key = $(item).find(DETAIL_SELECTORS.characteristicKey).text();
        if (!/condition/i.test(key)) continue;
        conditionHint = detectCondition($(item).find(DETAIL_SELECTORS.characteristicValue).text());
        break;
    }

    const $date = $(DETAIL_SELECTORS.date).first();

    return {
        description: textOrNull($(DETAIL_SELECTORS.description).first().text()),
        sellerName: textOrNull($(DETAIL_SELECTORS.seller).first().text()),
        postedAt: textOrNull($date.attr('datetime') ?? $date.text()),
        conditionHint,
    };
};

export const applyListingDetail = (listing: Listing, detail: ListingDetail): Listing => ({
    ...listing,
    description: detail.description ?? listing.description,
    sellerName: detail.sellerName ?? listing.sellerName,
    postedAt: detail.postedAt ?? listing.postedAt,
    conditionHint: detail.conditionHint ?? listing.conditionHint,
});
