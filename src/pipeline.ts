import { log } from 'apify';

import { classify } from './classifier.js';
import { NetworkError, NotFoundError, RateLimitedError } from './errors.js';
import { sortDeals } from './exporter.js';
import type { PageSource } from './fetcher.js';
import { type ResultStore, toStoredRecord, trackDeal } from './history.js';
import { applyListingDetail, buildIndexPageUrl, extractListingDetail, extractListings } from './scrapers/bazaraki.js';
import { isExcluded, scoreDeal } from './scorer.js';
import type { Catalog, Category, Listing, RunSummary, SkipReason, TrackedDeal } from './types.js';
import { mapWithConcurrency } from './utils.js';

export interface PipelineDeps {
    fetcher: PageSource;
    catalog: Catalog;
    store: ResultStore;
    now?: () => Date;
}

export interface PipelineOptions {
    categories: Category[];
    maxPagesPerCategory: number;
    minDealPercentage: number;
    maxConcurrency: number;
    fetchDetails: boolean;
    runTimeoutMs: number | null;
}

export interface PipelineResult {
    deals: TrackedDeal[];
    summary: RunSummary;
}

interface RunContext {
    deps: PipelineDeps;
    options: PipelineOptions;
    now: () => Date;
    deadline: number | null;
    seenUrls: Set<string>;
    deals: TrackedDeal[];
    summary: RunSummary;
}

const LOG_PREFIX = '[pipeline]';

export const emptySummary = (categories: Category[]): RunSummary => ({
    categories,
    pagesFetched: 0,
    listingsSeen: 0,
    classified: 0,
    scored: 0,
    qualifying: 0,
    newDeals: 0,
    priceDrops: 0,
    skipped: {
        'parse-error': 0,
        'malformed-price': 0,
        duplicate: 0,
        unclassified: 0,
        ambiguous: 0,
        'non-positive-price': 0,
        'no-reference-price': 0,
        'network-error': 0,
        'rate-limited': 0,
    },
    timedOut: false,
});

const skip = (ctx: RunContext, reason: SkipReason): void => {
    ctx.summary.skipped[reason] += 1;
};

const enrichWithDetail = async (ctx: RunContext, listing: Listing): Promise<Listing> => {
    try {
        const html = await ctx.deps.fetcher.fetchDetailPage(listing.url);
        return applyListingDetail(listing, extractListingDetail(html));
    } catch (error) {
        if (!(error instanceof NetworkError || error instanceof RateLimitedError || error instanceof NotFoundError)) {
            throw error;
        }
        log.warning(`${LOG_PREFIX} Detail page unavailable, keeping index data: ${error.message}`, {
            url: listing.url,
        });
        return listing;
    }
};

const processListing = async (ctx: RunContext, indexListing: Listing): Promise<void> => {
    ctx.summary.listingsSeen += 1;

    if (ctx.seenUrls.has(indexListing.url)) {
        log.info(`${LOG_PREFIX} Skipping duplicate listing`, { url: indexListing.url });
        skip(ctx, 'duplicate');
        return;
    }
    ctx.seenUrls.add(indexListing.url);

    const listing = ctx.options.fetchDetails ? await enrichWithDetail(ctx, indexListing) : indexListing;

    const classification = classify(listing.title, ctx.deps.catalog, listing.conditionHint);
    if (classification.status === 'unclassified') {
        const reason = classification.reason === 'ambiguous' ? 'ambiguous' : 'unclassified';
        log.info(`${LOG_PREFIX} Skipping ${reason} listing: ${listing.title}`, { url: listing.url });
        skip(ctx, reason);
        return;
    }
    ctx.summary.classified += 1;

    const entry = ctx.deps.catalog.get(classification.productId);
    if (!entry) throw new Error(`Classifier returned unknown product ${classification.productId}`);

    const result = scoreDeal(listing, classification, entry, ctx.options.minDealPercentage);
    if (isExcluded(result)) {
        log.info(`${LOG_PREFIX} Skipping listing (${result.reason}): ${listing.title}`, { url: listing.url });
        skip(ctx, result.reason);
        return;
    }
    ctx.summary.scored += 1;

    const upserted = await ctx.deps.store.upsert(toStoredRecord(result, ctx.now().toISOString()));
    const tracked = trackDeal(result, upserted);
    if (tracked.previousPrice !== null && listing.price < tracked.previousPrice) ctx.summary.priceDrops += 1;

    if (!tracked.qualifies) return;
    ctx.summary.qualifying += 1;
    if (tracked.isNew) ctx.summary.newDeals += 1;
    ctx.deals.push(tracked);
};

const crawlCategory = async (ctx: RunContext, category: Category): Promise<void> => {
    for (let page = 1; page <= ctx.options.maxPagesPerCategory; page++) {
        if (ctx.deadline !== null && ctx.now().getTime() >= ctx.deadline) {
            if (!ctx.summary.timedOut) log.warning(`${LOG_PREFIX} Run timeout reached, no further pages are fetched`);
            ctx.summary.timedOut = true;
            return;
        }

        const pageUrl = buildIndexPageUrl(category, page);
        let html: string;
        try {
            html = await ctx.deps.fetcher.fetchIndexPage(category, page);
        } catch (error) {
            if (error instanceof NotFoundError) {
                log.info(`${LOG_PREFIX} No page ${page} for ${category}, category done`);
                return;
            }
            if (error instanceof NetworkError || error instanceof RateLimitedError) {
                log.error(`${LOG_PREFIX} Skipping page ${page} (${category}): ${error.message}`, { url: pageUrl });
                skip(ctx, error instanceof RateLimitedError ? 'rate-limited' : 'network-error');
                continue;
            }
            throw error;
        }
        ctx.summary.pagesFetched += 1;

        let cards = 0;
        let found = 0;
        const listings = extractListings(html, {
            category,
            pageUrl,
            onSkip: (reason) => skip(ctx, reason),
            onCards: (count) => {
                cards = count;
            },
        });
        for (const listing of listings) {
            found += 1;
            await processListing(ctx, listing);
        }
        await ctx.deps.store.persist();

        if (cards === 0) {
            log.info(`${LOG_PREFIX} Empty page ${page} for ${category}, category done`, { url: pageUrl });
            return;
        }
        if (found === 0) {
            log.warning(`${LOG_PREFIX} None of the ${cards} cards on page ${page} (${category}) could be read`, {
                url: pageUrl,
            });
            continue;
        }
        log.info(`${LOG_PREFIX} Page ${page} (${category}): ${found} of ${cards} cards read`, { url: pageUrl });
    }
};

/**
 * Crawls the categories page by page and scores every listing. Categories share one worker pool; page
 * requests all go through the fetcher's single gate and store writes through the store's single writer.
 */
export const runPipeline = async (deps: PipelineDeps, options: PipelineOptions): Promise<PipelineResult> => {
    const now = deps.now ?? (() => new Date());
    const ctx: RunContext = {
        deps,
        options,
        now,
        deadline: options.runTimeoutMs !== null ? now().getTime() + options.runTimeoutMs : null,
        seenUrls: new Set(),
        deals: [],
        summary: emptySummary(options.categories),
    };

    log.info(`${LOG_PREFIX} Starting`, {
        categories: options.categories,
        maxPagesPerCategory: options.maxPagesPerCategory,
        minDealPercentage: options.minDealPercentage,
        maxConcurrency: options.maxConcurrency,
    });

    await mapWithConcurrency(options.categories, options.maxConcurrency, async (category) => {
        log.info(`${LOG_PREFIX} Crawling ${category}`);
        await crawlCategory(ctx, category);
    });
    await deps.store.persist();

    return { deals: sortDeals(ctx.deals), summary: ctx.summary };
};

export function logRunSummary(summary: RunSummary): void {
    const skippedTotal = Object.values(summary.skipped).reduce((sum, count) => sum + count, 0);
    log.info('Run summary', {
        pagesFetched: summary.pagesFetched,
        listingsSeen: summary.listingsSeen,
        classified: summary.classified,
        scored: summary.scored,
        qualifying: summary.qualifying,
        newDeals: summary.newDeals,
        priceDrops: summary.priceDrops,
        skippedTotal,
        skipped: summary.skipped,
        timedOut: summary.timedOut,
    });
}
