/**
 * Ranking Engine
 *
 * Cross-sectional ranking of one day's quote batch.
 *
 * Rules:
 * - Each category is ranked independently, highest percentage first.
 * - Rows without a value for the timeframe are left out (never treated as 0%).
 * - Equal values order by commodity name (code-point order), so the output does
 *   not depend on the order rows arrived in.
 */

import { ASSET_CATEGORIES, PERCENT_FIELD, TIMEFRAMES } from '../../types';
import type { Horizon, QuoteRecord, RankedEntry, Timeframe, TimeframeRankings } from '../../types';
import { ANALYSIS } from '../../config/analysisConfig';
import { AnalysisError } from '../utils/errors';

interface Scored {
    record: QuoteRecord;
    value: number;
}

export const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Descending value, then ascending name. */
export const compareScored = (a: { value: number; name: string }, b: { value: number; name: string }): number =>
    b.value - a.value || compareNames(a.name, b.name);

export const percentFor = (record: QuoteRecord, horizon: Horizon): number | null =>
    record[PERCENT_FIELD[horizon]];

function scoredRecords(records: readonly QuoteRecord[], horizon: Horizon): Scored[] {
    const out: Scored[] = [];
    for (const record of records) {
        const value = percentFor(record, horizon);
        if (value === null || !Number.isFinite(value)) continue;
        out.push({ record, value });
    }
    return out.sort((a, b) =>
        compareScored(
            { value: a.value, name: a.record.commodityName },
            { value: b.value, name: b.record.commodityName }
        )
    );
}

function assertCount(n: number, name: string): void {
    if (!Number.isInteger(n) || n < 1) {
        throw new AnalysisError('CONFIG_INVALID', `${name} must be a positive integer, got ${n}`);
    }
}

export const rank = (records: readonly QuoteRecord[], timeframe: Timeframe): RankedEntry[] => {
    const ranked = scoredRecords(records, timeframe);
    const out: RankedEntry[] = [];

    for (const category of ASSET_CATEGORIES) {
        let position = 0;
        for (const { record, value } of ranked) {
            if (record.assetCategory !== category) continue;
            position += 1;
            out.push({
                commodityName: record.commodityName,
                category,
                timeframe,
                rank: position,
                percentValue: value
            });
        }
    }

    return out;
};

export const topN = (
    records: readonly QuoteRecord[],
    timeframe: Timeframe,
    n: number = ANALYSIS.RANKING.TOP_N
): RankedEntry[] => {
    assertCount(n, 'topN');
    return rank(records, timeframe).filter(entry => entry.rank <= n);
};

export const rankAll = (records: readonly QuoteRecord[]): TimeframeRankings => {
    const out: TimeframeRankings = { Daily: [], Weekly: [], Monthly: [] };
    for (const timeframe of TIMEFRAMES) {
        out[timeframe] = rank(records, timeframe);
    }
    return out;
};

/** Leaderboard across all categories. */
export const topPerformers = (
    records: readonly QuoteRecord[],
    timeframe: Timeframe,
    n: number = ANALYSIS.RANKING.TOP_PERFORMERS
): RankedEntry[] => {
    assertCount(n, 'topPerformers');
    return scoredRecords(records, timeframe)
        .slice(0, n)
        .map(({ record, value }, i) => ({
            commodityName: record.commodityName,
            category: record.assetCategory,
            timeframe,
            rank: i + 1,
            percentValue: value
        }));
};

export const filterByName = (records: readonly QuoteRecord[], keyword: string): QuoteRecord[] => {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [...records];
    return records.filter(r => r.commodityName.toLowerCase().includes(needle));
};
