import { isAssetCategory } from '../../types';
import type { MalformedRecord, PercentField, QuoteRecord } from '../../types';

const PERCENT_FIELDS: PercentField[] = ['pctDaily', 'pctWeekly', 'pctMonthly', 'pctYearly', 'pct3Year'];

export interface BatchValidation {
    records: QuoteRecord[];
    rejected: MalformedRecord[];
}

function problemWith(record: QuoteRecord, quoteDate: string): string | null {
    if (!record.commodityName.trim()) return 'missing commodity name';
    if (!isAssetCategory(record.assetCategory)) return `unknown category "${record.assetCategory}"`;
    if (record.quoteDate !== quoteDate) return `quote date ${record.quoteDate} does not match run date ${quoteDate}`;
    if (!Number.isFinite(record.price)) return 'missing price';
    if (!Number.isFinite(record.changeAbsolute)) return 'missing absolute change';
    for (const field of PERCENT_FIELDS) {
        const value = record[field];
        if (value !== null && !Number.isFinite(value)) return `invalid ${field}`;
    }
    return null;
}

/**
 * Drops rows that cannot take part in the day's rankings.
 * The first row for a commodity name wins; later duplicates are rejected.
 */
export function validateBatch(records: readonly QuoteRecord[], quoteDate: string): BatchValidation {
    const accepted: QuoteRecord[] = [];
    const rejected: MalformedRecord[] = [];
    const seen = new Set<string>();

    records.forEach((record, rowIndex) => {
        const problem = problemWith(record, quoteDate);
        const commodityName = record.commodityName.trim() || null;

        if (problem) {
            rejected.push({ rowIndex, commodityName, reason: problem });
            return;
        }
        if (seen.has(record.commodityName)) {
            rejected.push({ rowIndex, commodityName, reason: 'duplicate commodity name in batch' });
            return;
        }

        seen.add(record.commodityName);
        accepted.push(record);
    });

    for (const r of rejected) {
        console.warn(`[Batch] Skipping row ${r.rowIndex} (${r.commodityName ?? 'unnamed'}): ${r.reason}`);
    }

    return { records: accepted, rejected };
}
