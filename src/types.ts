export type Category = 'phones' | 'laptops' | 'tablets' | 'audio' | 'cameras' | 'gaming' | 'wearables';
export type Condition = 'new' | 'used' | 'parts';

export interface Listing {
    url: string; // canonical origin + path, the listing identity
    category: Category;
    title: string;
    price: number; // EUR
    currency: 'EUR';
    location: string;
    conditionHint: Condition | null;
    postedAt: string | null;
    description: string | null; // detail page only
    sellerName: string | null; // detail page only
}

export interface ListingDetail {
    description: string | null;
    sellerName: string | null;
    postedAt: string | null;
    conditionHint: Condition | null;
}

export interface ConditionPrices {
    used: number;
    new: number;
    parts?: number;
}

export interface ReferenceEntry {
    productId: string;
    keywords: readonly string[]; // lower-cased
    conditions: Readonly<ConditionPrices>;
}

export type Catalog = ReadonlyMap<string, ReferenceEntry>;

export type Classification =
    | { status: 'classified'; productId: string; condition: Condition; score: number; runnerUpScore: number }
    | { status: 'unclassified'; reason: 'no-match' | 'ambiguous'; score: number };

export interface DealRecord {
    listing: Listing;
    productId: string;
    condition: Condition;
    referencePrice: number;
    discountPct: number; // one decimal place
    savings: number;
    qualifies: boolean;
}

export type DealExclusionReason = 'non-positive-price' | 'no-reference-price';

export interface DealExclusion {
    excluded: true;
    reason: DealExclusionReason;
}

export interface TrackedDeal extends DealRecord {
    isNew: boolean;
    priceChanged: boolean;
    previousPrice: number | null;
    firstSeenAt: string; // ISO date
}

export interface StoredListingRecord extends Listing {
    productId: string;
    condition: Condition;
    referencePrice: number;
    discountPct: number;
    savings: number;
    qualifies: boolean;
    firstSeenAt: string; // ISO date
    lastSeenAt: string; // ISO date
}

export type HistoryStore = Record<string, StoredListingRecord>;

export type SkipReason =
    | 'parse-error'
    | 'malformed-price'
    | 'duplicate'
    | 'unclassified'
    | 'ambiguous'
    | DealExclusionReason
    | 'network-error'
    | 'rate-limited';

export interface RunSummary {
    categories: Category[];
    pagesFetched: number;
    listingsSeen: number;
    classified: number;
    scored: number;
    qualifying: number;
    newDeals: number;
    priceDrops: number;
    skipped: Record<SkipReason, number>;
    timedOut: boolean;
}
