import { EUR_RATES } from './constants.js';

// Trimmed to 12 significant digits before rounding: 1.005 * 100 rounds as 100.5.
export const roundTo = (value: number, decimals: number): number => {
    const factor = 10 ** decimals;
    return Math.round(Number((value * factor).toPrecision(12))) / factor;
};

export const toCents = (amount: number): number => Math.round(amount * 100);

const FIRST_AMOUNT = /\d[\d.,\s]*/;

const detectCurrency = (text: string): string => {
    if (/\$|usd/i.test(text)) return 'USD';
    if (/£|gbp/i.test(text)) return 'GBP';
    return 'EUR';
};

/**
 * Decides which separator is the decimal one. With both present the last wins; a lone separator is
 * a decimal point only when one or two digits follow it ("2,50", "12.99"), otherwise thousands ("1,250").
 */
const normalizeSeparators = (digits: string): string => {
    const lastDot = digits.lastIndexOf('.');
    const lastComma = digits.lastIndexOf(',');

    if (lastDot !== -1 && lastComma !== -1) {
        const decimal = lastDot > lastComma ? '.' : ',';
        const thousands = decimal === '.' ? ',' : '.';
        return digits.split(thousands).join('').replace(decimal, '.');
    }

    const separator = lastDot !== -1 ? '.' : lastComma !== -1 ? ',' : null;
    if (!separator) return digits;

    const parts = digits.split(separator);
    const tail = parts[parts.length - 1] ?? '';
    if (parts.length === 2 && tail.length > 0 && tail.length <= 2) {
        return `${parts[0]}.${tail}`;
    }
    return parts.join('');
};

/**
 * Parses a displayed price into EUR. Only the first amount counts, so "€850 was €900" reads as 850.
 * Returns null when no number can be read; never defaults to 0.
 */
export const parsePrice = (text: string | null | undefined): number | null => {
    if (!text) return null;
    const amount = FIRST_AMOUNT.exec(text);
    if (!amount) return null;
    const digits = amount[0].replace(/\s/g, '').replace(/[.,]+$/, '');

    const value = Number.parseFloat(normalizeSeparators(digits));
    if (Number.isNaN(value)) return null;

    const rate = EUR_RATES[detectCurrency(text)] ?? 1;
    return roundTo(value * rate, 2);
};

export const canonicalizeUrl = (rawUrl: string, base?: string): string | null => {
    try {
        const url = new URL(rawUrl, base);
        if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
        return `${url.origin}${url.pathname}`;
    } catch {
        return null;
    }
};

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** Runs `worker` over `items` with at most `limit` calls in flight; results keep input order. */
export const mapWithConcurrency = async <T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    const results: R[] = new Array<R>(items.length);
    let next = 0;

    const runWorker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    const workerCount = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: workerCount }, runWorker));
    return results;
};
