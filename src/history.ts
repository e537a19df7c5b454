import { log } from 'apify';

import { LISTING_HISTORY_KEY } from './constants.js';
import type { DealRecord, HistoryStore, StoredListingRecord, TrackedDeal } from './types.js';

/** The part of a key-value store the history needs; Apify's KeyValueStore satisfies it. */
export interface RecordStorage {
    getValue<T>(key: string): Promise<T | null>;
    setValue<T>(key: string, value: T, options?: { contentType?: string }): Promise<void>;
}

export interface UpsertResult {
    record: StoredListingRecord;
    previous: StoredListingRecord | null;
}

export async function loadHistory(storage: RecordStorage, key = LISTING_HISTORY_KEY): Promise<HistoryStore> {
    return (await storage.getValue<HistoryStore>(key)) ?? {};
}

export async function saveHistory(
    storage: RecordStorage,
    history: HistoryStore,
    key = LISTING_HISTORY_KEY,
): Promise<void> {
    await storage.setValue(key, history);
}

// ISO timestamps compare lexicographically.
const earliest = (a: string, b: string): string => (a < b ? a : b);
const latest = (a: string, b: string): string => (a > b ? a : b);

export const toStoredRecord = (deal: DealRecord, observedAt: string): StoredListingRecord => ({
    ...deal.listing,
    productId: deal.productId,
    condition: deal.condition,
    referencePrice: deal.referencePrice,
    discountPct: deal.discountPct,
    savings: deal.savings,
    qualifies: deal.qualifies,
    firstSeenAt: observedAt,
    lastSeenAt: observedAt,
});

export const trackDeal = (deal: DealRecord, { record, previous }: UpsertResult): TrackedDeal => {
    const previousPrice = previous !== null && previous.price !== deal.listing.price ? previous.price : null;
    return {
        ...deal,
        isNew: previous === null,
        priceChanged: previousPrice !== null,
        previousPrice,
        firstSeenAt: record.firstSeenAt,
    };
};

/**
 * URL-keyed listing history. Reads go to the in-memory index; upserts and persists are queued through a
 * single writer, so two observations of one URL can never race on its first-seen timestamp.
 */
export class ResultStore {
    private readonly records: Map<string, StoredListingRecord>;
    private writeQueue: Promise<void> = Promise.resolve();
    private dirty = false;

    private constructor(
        private readonly storage: RecordStorage,
        private readonly key: string,
        history: HistoryStore,
    ) {
        this.records = new Map(Object.entries(history));
    }

    static async open(storage: RecordStorage, key = LISTING_HISTORY_KEY): Promise<ResultStore> {
        const store = new ResultStore(storage, key, await loadHistory(storage, key));
        log.info(`[history] Loaded ${store.size} known listings`, { key });
        return store;
    }

    get size(): number {
        return this.records.size;
    }

    exists(url: string): boolean {
        return this.records.has(url);
    }

    get(url: string): StoredListingRecord | undefined {
        return this.records.get(url);
    }

    upsert(record: StoredListingRecord): Promise<UpsertResult> {
        return this.enqueue(() => {
            const previous = this.records.get(record.url) ?? null;
            const merged: StoredListingRecord = {
                ...record,
                firstSeenAt: previous ? earliest(previous.firstSeenAt, record.firstSeenAt) : record.firstSeenAt,
                lastSeenAt: previous ? latest(previous.lastSeenAt, record.lastSeenAt) : record.lastSeenAt,
            };
            this.records.set(record.url, merged);
            this.dirty = true;
            return { record: merged, previous };
        });
    }

    /** Writes the history once all queued upserts are applied. No-op when nothing changed. */
    persist(): Promise<void> {
        return this.enqueue(async () => {
            if (!this.dirty) return;
            await saveHistory(this.storage, Object.fromEntries(this.records), this.key);
            this.dirty = false;
        });
    }

    private enqueue<T>(task: () => T | Promise<T>): Promise<T> {
        const result = this.writeQueue.then(task);
        this.writeQueue = result.then(
            () => undefined,
            () => undefined,
        );
        return result;
    }
}
