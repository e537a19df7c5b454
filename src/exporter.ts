import { log } from 'apify';

import type { RecordStorage } from './history.js';
import type { TrackedDeal } from './types.js';

export interface ExportMeta {
    generatedAt: Date;
    minDealPercentage: number;
}

export interface ExportFiles {
    csv: string;
    json: string;
    html: string;
}

export interface ExportFileNames {
    csv: string;
    json: string;
    html: string;
}

const CSV_HEADERS = [
    'rank',
    'url',
    'title',
    'product',
    'condition',
    'price_eur',
    'reference_price_eur',
    'discount_pct',
    'savings_eur',
    'location',
    'category',
    'posted_at',
    'is_new',
    'first_seen_at',
];

/** Highest discount first; equal discounts ordered by URL so every export lists deals identically. */
export const sortDeals = <T extends TrackedDeal>(deals: readonly T[]): T[] =>
    [...deals].sort((a, b) => {
        if (a.discountPct !== b.discountPct) return b.discountPct - a.discountPct;
        if (a.listing.url === b.listing.url) return 0;
        return a.listing.url < b.listing.url ? -1 : 1;
    });

const escapeCsv = (value: string): string => (/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

const escapeHtml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#039;');

const SUMMARY_HEADERS = ['Product', 'Price', 'Reference', 'Savings', 'Discount', 'Location'];
const NO_DEALS = '\n    <p>No qualifying deals in this run.</p>';

const formatEur = (amount: number): string => `€${amount.toFixed(2)}`;

export const toCsv = (deals: readonly TrackedDeal[]): string => {
    const rows = deals.map((deal, index) =>
        [
            String(index + 1),
            deal.listing.url,
            deal.listing.title,
            deal.productId,
            deal.condition,
            deal.listing.price.toFixed(2),
            deal.referencePrice.toFixed(2),
            deal.discountPct.toFixed(1),
            deal.savings.toFixed(2),
            deal.listing.location,
            deal.listing.category,
            deal.listing.postedAt ?? '',
            String(deal.isNew),
            deal.firstSeenAt,
        ]
            .map(escapeCsv)
            .join(','),
    );
    return [CSV_HEADERS.join(','), ...rows].join('\n');
};

export const toJson = (deals: readonly TrackedDeal[], meta: ExportMeta): string =>
    JSON.stringify(
        {
            generatedAt: meta.generatedAt.toISOString(),
            minDealPercentage: meta.minDealPercentage,
            count: deals.length,
            deals: deals.map((deal, index) => ({
                rank: index + 1,
                url: deal.listing.url,
                title: deal.listing.title,
                productId: deal.productId,
                condition: deal.condition,
                price: deal.listing.price,
                referencePrice: deal.referencePrice,
                discountPct: deal.discountPct,
                savings: deal.savings,
                location: deal.listing.location,
                category: deal.listing.category,
                postedAt: deal.listing.postedAt,
                description: deal.listing.description,
                sellerName: deal.listing.sellerName,
                isNew: deal.isNew,
                priceChanged: deal.priceChanged,
                previousPrice: deal.previousPrice,
                firstSeenAt: deal.firstSeenAt,
            })),
        },
        null,
        2,
    );

const renderSummaryRow = (deal: TrackedDeal): string => `
        <tr>
            <td>${escapeHtml(deal.listing.title)}</td>
            <td>${formatEur(deal.listing.price)}</td>
            <td>${formatEur(deal.referencePrice)}</td>
            <td>${formatEur(deal.savings)}</td>
            <td>${deal.discountPct.toFixed(1)}%</td>
            <td>${escapeHtml(deal.listing.location)}</td>
        </tr>`;

const renderDealCard = (deal: TrackedDeal): string => {
    const lines = [
        `<h3>${escapeHtml(deal.listing.title)}${deal.isNew ? ' <span class="new">NEW</span>' : ''}</h3>`,
        `<p>${formatEur(deal.listing.price)} <strong>${deal.discountPct.toFixed(1)}% off</strong></p>`,
        `<p>Reference price: ${formatEur(deal.referencePrice)} (${escapeHtml(deal.productId)}, ${deal.condition})</p>`,
        `<p>You save: ${formatEur(deal.savings)}</p>`,
        `<p>Location: ${escapeHtml(deal.listing.location)}</p>`,
    ];
    if (deal.previousPrice !== null) lines.push(`<p>Previously: ${formatEur(deal.previousPrice)}</p>`);
    if (deal.listing.postedAt) lines.push(`<p>Posted: ${escapeHtml(deal.listing.postedAt)}</p>`);
    if (deal.listing.sellerName) lines.push(`<p>Seller: ${escapeHtml(deal.listing.sellerName)}</p>`);
    if (deal.listing.description) lines.push(`<p>${escapeHtml(deal.listing.description)}</p>`);
    lines.push(`<p><a href="${escapeHtml(deal.listing.url)}" target="_blank" rel="noopener">View listing</a></p>`);

    return `
    <div class="deal">
        ${lines.join('\n        ')}
    </div>`;
};

export const toHtml = (deals: readonly TrackedDeal[], meta: ExportMeta): string => {
    const summaryRows = deals.map(renderSummaryRow).join('');
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="utf-8">
    <title>Electronics deals report</title>
    <style>
        body { font-family: sans-serif; margin: 20px; }
        table { border-collapse: collapse; width: 100%; }
        th, td { border: 1px solid #ddd; padding: 6px; text-align: left; }
        .deal { border: 1px solid #ddd; padding: 12px; margin: 10px 0; }
        .new { color: #5cb85c; }
    </style>
</head>
<body>
    <h1>Electronics deals report</h1>
    <p>Generated: ${meta.generatedAt.toISOString()}</p>
    <p>Minimum discount: ${meta.minDealPercentage}%</p>
    <p>Deals found: ${deals.length}</p>
    <h2>Summary</h2>
    <table>
        <tr>${SUMMARY_HEADERS.map((header) => `<th>${header}</th>`).join('')}</tr>${summaryRows}
    </table>
    <h2>Deals</h2>${deals.length > 0 ? deals.map(renderDealCard).join('') : NO_DEALS}
</body>
</html>
`;
};

/** All three formats from one sorted copy of the deals. */
export const buildExports = (deals: readonly TrackedDeal[], meta: ExportMeta): ExportFiles => {
    const sorted = sortDeals(deals);
    return {
        csv: toCsv(sorted),
        json: toJson(sorted, meta),
        html: toHtml(sorted, meta),
    };
};

const pad = (value: number): string => String(value).padStart(2, '0');

export const exportFileNames = (date: Date): ExportFileNames => {
    const stamp = [
        `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`,
        `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`,
    ].join('-');
    return {
        csv: `DEALS-${stamp}.csv`,
        json: `DEALS-${stamp}.json`,
        html: `REPORT-${stamp}.html`,
    };
};

export const saveExports = async (
    storage: RecordStorage,
    files: ExportFiles,
    names: ExportFileNames,
): Promise<void> => {
    await storage.setValue(names.csv, files.csv, { contentType: 'text/csv' });
    await storage.setValue(names.json, files.json, { contentType: 'application/json' });
    await storage.setValue(names.html, files.html, { contentType: 'text/html' });
    log.info('[export] Saved run outputs', { ...names });
};
