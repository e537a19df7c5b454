import type { Classification, DealExclusion, DealRecord, Listing, ReferenceEntry } from './types.js';
import { toCents } from './utils.js';

type ClassifiedAs = Extract<Classification, { status: 'classified' }>;

/** Computed in whole cents, so an exact x.x5% rounds up. */
export const calcDiscountPct = (listingPrice: number, referencePrice: number): number => {
    const referenceCents = toCents(referencePrice);
    return Math.round(((referenceCents - toCents(listingPrice)) * 1000) / referenceCents) / 10;
};

/**
 * Scores a classified listing against its catalog entry. A price above the reference gives a negative
 * discount, which simply fails the threshold.
 */
export const scoreDeal = (
    listing: Listing,
    classification: ClassifiedAs,
    entry: ReferenceEntry,
    minDealPercentage: number,
): DealRecord | DealExclusion => {
    if (listing.price <= 0) return { excluded: true, reason: 'non-positive-price' };

    const referencePrice = entry.conditions[classification.condition];
    if (referencePrice === undefined) return { excluded: true, reason: 'no-reference-price' };

    const discountPct = calcDiscountPct(listing.price, referencePrice);

    return {
        listing,
        productId: entry.productId,
        condition: classification.condition,
        referencePrice,
        discountPct,
        savings: (toCents(referencePrice) - toCents(listing.price)) / 100,
        qualifies: discountPct >= minDealPercentage && listing.price > 0,
    };
};

export const isExcluded = (result: DealRecord | DealExclusion): result is DealExclusion => 'excluded' in result;
