import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { loadCatalog } from './catalog.js';
import { buildExports, exportFileNames, saveExports } from './exporter.js';
import { PageFetcher } from './fetcher.js';
import { RequestGate } from './gate.js';
import { ResultStore } from './history.js';
import { enabledCategories, parseInput } from './input.js';
import { logRunSummary, runPipeline } from './pipeline.js';

await Actor.init();

const failRun = async (error: unknown): Promise<never> => {
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Setup failed: ${message}`);
    await Actor.fail(message);
    throw error;
};

const input = await Actor.getInput<unknown>().then(parseInput).catch(failRun);
const catalog = await loadCatalog(input.catalogPath).catch(failRun);
const categories = enabledCategories(input);

log.info('Starting Electronics Deal Finder', {
    categories,
    maxPagesPerCategory: input.maxPagesPerCategory,
    minDealPercentage: input.minDealPercentage,
    requestDelaySecs: input.requestDelaySecs,
    maxConcurrency: input.maxConcurrency,
    fetchDetails: input.fetchDetails,
});

const historyStore = await Actor.openKeyValueStore(input.historyStoreId);
const store = await ResultStore.open(historyStore);

Actor.on('aborting', async () => {
    await store.persist();
    // Give the platform time to flush storage writes before exiting.
    await setTimeout(1000);
    await Actor.exit();
});

const gate = new RequestGate(input.requestDelaySecs * 1000);
const fetcher = new PageFetcher({ gate, maxRetries: input.maxRetries });
const startedAt = new Date();

const { deals, summary } = await runPipeline(
    { fetcher, catalog, store },
    {
        categories,
        maxPagesPerCategory: input.maxPagesPerCategory,
        minDealPercentage: input.minDealPercentage,
        maxConcurrency: input.maxConcurrency,
        fetchDetails: input.fetchDetails,
        runTimeoutMs: input.runTimeoutSecs !== null ? input.runTimeoutSecs * 1000 : null,
    },
);

logRunSummary(summary);

const outputStore = await Actor.openKeyValueStore();
await saveExports(
    outputStore,
    buildExports(deals, { generatedAt: startedAt, minDealPercentage: input.minDealPercentage }),
    exportFileNames(startedAt),
);

if (deals.length > 0) {
    await Actor.pushData(
        deals.map(({ listing, ...deal }) => ({
            ...listing,
            ...deal,
        })),
    );
    for (const [index, deal] of deals.slice(0, 5).entries()) {
        log.info(
            `#${index + 1} ${deal.listing.title}: €${deal.listing.price.toFixed(2)} ` +
                `(reference €${deal.referencePrice.toFixed(2)}, ${deal.discountPct.toFixed(1)}% off)`,
            { url: deal.listing.url },
        );
    }
} else {
    log.info(`No listings at least ${input.minDealPercentage}% below reference price.`);
}

log.info(`Done. ${deals.length} deals, ${store.size} listings in history.`);
await Actor.exit();
