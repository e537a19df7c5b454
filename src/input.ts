import { z } from 'zod';

import { CATEGORIES, INPUT_DEFAULTS } from './constants.js';
import { InputError } from './errors.js';
import type { Category } from './types.js';

const categoryFlag = z.boolean().default(true);

const inputSchema = z.object({
    categories: z
        .object({
            phones: categoryFlag,
            laptops: categoryFlag,
            tablets: categoryFlag,
            audio: categoryFlag,
            cameras: categoryFlag,
            gaming: categoryFlag,
            wearables: categoryFlag,
        })
        .strict()
        .default({}),
    maxPagesPerCategory: z.number().int().min(1).default(INPUT_DEFAULTS.maxPagesPerCategory),
    minDealPercentage: z.number().default(INPUT_DEFAULTS.minDealPercentage),
    requestDelaySecs: z.number().min(0).default(INPUT_DEFAULTS.requestDelaySecs),
    maxRetries: z.number().int().min(0).default(INPUT_DEFAULTS.maxRetries),
    maxConcurrency: z.number().int().min(1).default(INPUT_DEFAULTS.maxConcurrency),
    fetchDetails: z.boolean().default(INPUT_DEFAULTS.fetchDetails),
    runTimeoutSecs: z.number().positive().nullable().default(INPUT_DEFAULTS.runTimeoutSecs),
    catalogPath: z.string().min(1).optional(),
    historyStoreId: z.string().min(1).default(INPUT_DEFAULTS.historyStoreId),
});

export type Input = z.infer<typeof inputSchema>;

/** Validates the Actor input (null when none was given) and fills in defaults. */
export const parseInput = (raw: unknown): Input => {
    const result = inputSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
        throw new InputError(`Invalid input: ${issues.join('; ')}`);
    }
    return result.data;
};

export const enabledCategories = (input: Input): Category[] =>
    CATEGORIES.filter((category) => input.categories[category]);
