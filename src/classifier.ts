import type { Catalog, Classification, Condition, ReferenceEntry } from './types.js';
import { normalizeWhitespace } from './utils.js';

const PARTS_MARKERS = /\b(for parts|spares or repair|not working|broken)\b/i;
const USED_MARKERS = /\b(like new|refurbished|renewed|used)\b/i;
const NEW_MARKERS = /\b(brand new|sealed|unopened|new)\b/i;

/**
 * Condition stated in free text. "Like new" and other used markers win over "new", so a title such as
 * "used, new battery" reads as used.
 */
export const detectCondition = (text: string): Condition | null => {
    if (PARTS_MARKERS.test(text)) return 'parts';
    if (USED_MARKERS.test(text)) return 'used';
    if (NEW_MARKERS.test(text)) return 'new';
    return null;
};

const normalizeTitle = (title: string): string => normalizeWhitespace(title).toLowerCase();

/** Number of the entry's keyword variants found in the title. */
export const scoreEntry = (title: string, entry: ReferenceEntry): number => {
    const normalized = normalizeTitle(title);
    return entry.keywords.filter((keyword) => normalized.includes(keyword)).length;
};

/**
 * Best catalog match for a title. Equal top scores are reported as ambiguous instead of picking one,
 * since a wrong product yields a misleading discount.
 */
export const classify = (
    title: string,
    catalog: Catalog,
    fallbackCondition: Condition | null = null,
): Classification => {
    let best: ReferenceEntry | null = null;
    let bestScore = 0;
    let runnerUpScore = 0;
    let tied = false;

    for (const entry of catalog.values()) {
        const score = scoreEntry(title, entry);
        if (score === 0) continue;

        if (score > bestScore) {
            runnerUpScore = bestScore;
            best = entry;
            bestScore = score;
            tied = false;
        } else if (score === bestScore) {
            tied = true;
            runnerUpScore = score;
        } else if (score > runnerUpScore) {
            runnerUpScore = score;
        }
    }

    if (!best) return { status: 'unclassified', reason: 'no-match', score: 0 };
    if (tied) return { status: 'unclassified', reason: 'ambiguous', score: bestScore };

    return {
        status: 'classified',
        productId: best.productId,
        condition: detectCondition(title) ?? fallbackCondition ?? 'used',
        score: bestScore,
        runnerUpScore,
    };
};
