import { NotFoundError } from '../errors.js';
import type { PageSource } from '../fetcher.js';
import type { RecordStorage } from '../history.js';
import { buildIndexPageUrl } from '../scrapers/bazaraki.js';
import type { Category, Listing } from '../types.js';

/** In-process stand-in for a key-value store; values go through JSON like the real one. */
export class MemoryStorage implements RecordStorage {
    readonly values = new Map<string, string>();
    readonly contentTypes = new Map<string, string | undefined>();
    writes = 0;

    async getValue<T>(key: string): Promise<T | null> {
        const raw = this.values.get(key);
        return raw === undefined ? null : JSON.parse(raw);
    }

    async setValue<T>(key: string, value: T, options?: { contentType?: string }): Promise<void> {
        this.writes += 1;
        this.values.set(key, JSON.stringify(value));
        this.contentTypes.set(key, options?.contentType);
    }
}

export interface CardFixture {
    title?: string;
    href?: string;
    price?: string;
    location?: string;
    date?: string;
}

export const renderCard = (card: CardFixture): string => {
    const parts = ['<li class="announcement-container">'];
    if (card.title !== undefined) {
        parts.push(`<a class="announcement-block__title" href="${card.href ?? '/adv/1_item/'}">${card.title}</a>`);
    }
    if (card.price !== undefined) parts.push(`<div class="announcement-block__price">${card.price}</div>`);
    if (card.location !== undefined) parts.push(`<div class="announcement-block__location">${card.location}</div>`);
    if (card.date !== undefined) parts.push(`<div class="announcement-block__date">${card.date}</div>`);
    parts.push('</li>');
    return parts.join('\n');
};

export const renderIndexPage = (cards: CardFixture[]): string =>
    `<html><body><ul class="list-simple__output">${cards.map(renderCard).join('\n')}</ul></body></html>`;

export const makeListing = (overrides: Partial<Listing> = {}): Listing => ({
    url: 'https://www.bazaraki.com/adv/1001_iphone-14-pro-max/',
    category: 'phones',
    title: 'iPhone 14 Pro Max 256GB',
    price: 632,
    currency: 'EUR',
    location: 'Limassol',
    conditionHint: null,
    postedAt: null,
    description: null,
    sellerName: null,
    ...overrides,
});

/** Serves index pages keyed "category:page"; a missing key answers like a page past the last one. */
export class FakePageSource implements PageSource {
    readonly requests: string[] = [];

    constructor(
        private readonly pages: Record<string, string | Error>,
        private readonly details: Record<string, string | Error> = {},
    ) {}

    async fetchIndexPage(category: Category, page: number): Promise<string> {
        const key = `${category}:${page}`;
        this.requests.push(key);
        return this.serve(this.pages[key], buildIndexPageUrl(category, page));
    }

    async fetchDetailPage(url: string): Promise<string> {
        this.requests.push(url);
        return this.serve(this.details[url], url);
    }

    private serve(page: string | Error | undefined, url: string): string {
        if (page === undefined) throw new NotFoundError(url);
        if (page instanceof Error) throw page;
        return page;
    }
}
