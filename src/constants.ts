import type { Category } from './types.js';

export const BASE_URL = 'https://www.bazaraki.com';

export const CATEGORIES: Category[] = ['phones', 'laptops', 'tablets', 'audio', 'cameras', 'gaming', 'wearables'];

export const CATEGORY_PATHS: Record<Category, string> = {
    phones: '/electronics/mobile-phones/',
    laptops: '/electronics/computers-laptops/',
    tablets: '/electronics/tablets/',
    audio: '/electronics/audio-video/',
    cameras: '/electronics/cameras/',
    gaming: '/electronics/gaming/',
    wearables: '/electronics/smartwatches-wearables/',
};

export const INPUT_DEFAULTS = {
    maxPagesPerCategory: 3,
    minDealPercentage: 15,
    requestDelaySecs: 2,
    maxRetries: 3,
    maxConcurrency: 1,
    fetchDetails: false,
    runTimeoutSecs: null,
    historyStoreId: 'DEAL-HISTORY',
};

export const LISTING_HISTORY_KEY = 'LISTING_HISTORY';

export const BACKOFF_BASE_MS = 1000;
export const REQUEST_TIMEOUT_MS = 30_000;

// Rough conversion rates; listings are compared in EUR.
export const EUR_RATES: Record<string, number> = {
    EUR: 1,
    USD: 0.92,
    GBP: 1.17,
};

export const FETCH_HEADERS = {
    'Accept-Language': 'en-US,en;q=0.9',
    Referer: 'https://www.bazaraki.com/',
};
