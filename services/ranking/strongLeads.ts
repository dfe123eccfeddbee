/**
 * Strong Lead Detector
 *
 * A strong lead is a commodity that sits in the top K of its category on at least
 * two timeframes at once. Leads are ranked against each other and compared with
 * the previous persisted snapshot to produce day-over-day ranking changes.
 */

import { TIMEFRAMES } from '../../types';
import type { AssetCategory, QuoteRecord, StrongLead, Timeframe } from '../../types';
import { ANALYSIS } from '../../config/analysisConfig';
import { compareNames, topN } from './rankingEngine';

export interface StrongLeadOptions {
    quoteDate: string;
    topK?: number;
    minTimeframes?: number;
}

interface Qualification {
    commodityName: string;
    category: AssetCategory;
    timeframes: Set<Timeframe>;
    rankSum: number;
}

const TIMEFRAME_ABBREVIATION: Record<Timeframe, string> = {
    Daily: 'D',
    Weekly: 'W',
    Monthly: 'M'
};

export const formatMatchInfo = (timeframes: readonly Timeframe[]): string =>
    `${timeframes.length}/${TIMEFRAMES.length} (${timeframes.map(t => TIMEFRAME_ABBREVIATION[t]).join(',')})`;

export function detectStrongLeads(
    records: readonly QuoteRecord[],
    previous: readonly StrongLead[],
    options: StrongLeadOptions
): StrongLead[] {
    const topK = options.topK ?? ANALYSIS.STRONG_LEADS.TOP_K;
    const minTimeframes = options.minTimeframes ?? ANALYSIS.STRONG_LEADS.MIN_TIMEFRAMES;

    const byName = new Map<string, Qualification>();
    for (const timeframe of TIMEFRAMES) {
        for (const entry of topN(records, timeframe, topK)) {
            let q = byName.get(entry.commodityName);
            if (!q) {
                q = { commodityName: entry.commodityName, category: entry.category, timeframes: new Set(), rankSum: 0 };
                byName.set(entry.commodityName, q);
            }
            q.timeframes.add(timeframe);
            q.rankSum += entry.rank;
        }
    }

    const qualified = [...byName.values()]
        .filter(q => q.timeframes.size >= minTimeframes)
        .sort((a, b) =>
            b.timeframes.size - a.timeframes.size
            || a.rankSum - b.rankSum
            || compareNames(a.commodityName, b.commodityName)
        );

    const previousRanking = new Map(previous.map(lead => [lead.commodityName, lead.ranking]));
    const perCategory = new Map<AssetCategory, number>();

    return qualified.map((q, i) => {
        const ranking = i + 1;
        const categoryRanking = (perCategory.get(q.category) ?? 0) + 1;
        perCategory.set(q.category, categoryRanking);

        const prior = previousRanking.get(q.commodityName) ?? null;
        // Published in canonical order regardless of discovery order
        const timeframesQualified = TIMEFRAMES.filter(t => q.timeframes.has(t));

        return {
            commodityName: q.commodityName,
            category: q.category,
            quoteDate: options.quoteDate,
            ranking,
            categoryRanking,
            previousRanking: prior,
            rankingChange: prior === null ? null : prior - ranking,
            timeframesQualified,
            rankSum: q.rankSum,
            matchInfo: formatMatchInfo(timeframesQualified)
        };
    });
}

export interface RankingChangeOptions {
    moversOnly?: boolean;
    limit?: number;
}

/** Biggest absolute movers first; leads without a previous ranking go last. */
export function rankingChanges(leads: readonly StrongLead[], options: RankingChangeOptions = {}): StrongLead[] {
    const filtered = options.moversOnly
        ? leads.filter(l => l.rankingChange !== null && l.rankingChange !== 0)
        : [...leads];

    const sorted = filtered.sort((a, b) => {
        if (a.rankingChange === null || b.rankingChange === null) {
            if (a.rankingChange !== b.rankingChange) return a.rankingChange === null ? 1 : -1;
            return a.ranking - b.ranking;
        }
        return Math.abs(b.rankingChange) - Math.abs(a.rankingChange) || a.ranking - b.ranking;
    });

    return options.limit === undefined ? sorted : sorted.slice(0, options.limit);
}
