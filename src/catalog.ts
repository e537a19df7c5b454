import { readFile } from 'node:fs/promises';

import { log } from 'apify';
import { z } from 'zod';

import { CatalogLoadError } from './errors.js';
import type { Catalog, ReferenceEntry } from './types.js';

export const DEFAULT_CATALOG_URL = new URL('../data/catalog.json', import.meta.url);

const priceSchema = z.number().positive();

const referenceEntrySchema = z.object({
    conditions: z
        .object({
            used: priceSchema,
            new: priceSchema,
            parts: priceSchema.optional(),
        })
        .strict(),
    keywords: z.array(z.string().trim().min(1)).min(1),
});

export const catalogSchema = z.record(z.string().min(1), referenceEntrySchema);

export type RawCatalog = z.input<typeof catalogSchema>;

/** Builds the immutable catalog; keywords are lower-cased and deduplicated, order kept. */
export const parseCatalog = (raw: unknown): Catalog => {
    const result = catalogSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new CatalogLoadError(`Invalid catalog: ${issues.join('; ')}`);
    }

    const entries = Object.entries(result.data).map(
        ([productId, { conditions, keywords }]): [string, ReferenceEntry] => [
            productId,
            Object.freeze({
                productId,
                keywords: Object.freeze([...new Set(keywords.map((keyword) => keyword.toLowerCase()))]),
                conditions: Object.freeze({ ...conditions }),
            }),
        ],
    );
    if (entries.length === 0) throw new CatalogLoadError('Catalog has no entries');

    return new Map(entries);
};

export const loadCatalog = async (path: string | URL = DEFAULT_CATALOG_URL): Promise<Catalog> => {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CatalogLoadError(`Failed to read catalog ${String(path)}: ${reason}`, { cause: error });
    }

    const catalog = parseCatalog(raw);
    log.info(`[catalog] Loaded ${catalog.size} reference products`, { path: String(path) });
    return catalog;
};
