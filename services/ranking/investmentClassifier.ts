/**
 * Investment Opportunity Classifier
 *
 * A move only counts when the adjacent, longer horizon points the same way:
 *   Short-term  Daily   confirmed by Weekly
 *   Mid-term    Weekly  confirmed by Monthly
 *   Long-term   Monthly confirmed by Yearly
 *
 * Buckets are independent classifications; one commodity may land in several.
 */

import { OPPORTUNITY_TIMEFRAMES } from '../../types';
import type {
    AssetCategory,
    Horizon,
    InvestmentOpportunity,
    MomentumDirection,
    OpportunityBuckets,
    OpportunityTimeframe,
    QuoteRecord
} from '../../types';
import { ANALYSIS } from '../../config/analysisConfig';
import { compareScored, percentFor } from './rankingEngine';

export interface ClassifierOptions {
    quoteDate: string;
    threshold?: number;
}

interface BucketRule {
    lead: Horizon;
    confirm: Horizon;
}

export const BUCKET_RULES: Record<OpportunityTimeframe, BucketRule> = {
    'Short-term': { lead: 'Daily', confirm: 'Weekly' },
    'Mid-term': { lead: 'Weekly', confirm: 'Monthly' },
    'Long-term': { lead: 'Monthly', confirm: 'Yearly' }
};

/** Shared direction of two readings, or null when they disagree or either is flat/missing. */
export function confirmedDirection(lead: number | null, confirm: number | null): MomentumDirection | null {
    if (lead === null || confirm === null) return null;
    const sign = Math.sign(lead);
    if (sign === 0 || sign !== Math.sign(confirm)) return null;
    return sign > 0 ? 'up' : 'down';
}

export function classifyBucket(
    records: readonly QuoteRecord[],
    timeframe: OpportunityTimeframe,
    options: ClassifierOptions
): InvestmentOpportunity[] {
    const threshold = options.threshold ?? ANALYSIS.MOMENTUM.THRESHOLD;
    const rule = BUCKET_RULES[timeframe];

    const candidates: { record: QuoteRecord; value: number; direction: MomentumDirection }[] = [];
    for (const record of records) {
        const lead = percentFor(record, rule.lead);
        const direction = confirmedDirection(lead, percentFor(record, rule.confirm));
        if (lead === null || direction === null) continue;
        if (Math.abs(lead) < threshold) continue;
        candidates.push({ record, value: lead, direction });
    }

    candidates.sort((a, b) =>
        compareScored(
            { value: a.value, name: a.record.commodityName },
            { value: b.value, name: b.record.commodityName }
        )
    );

    const perCategory = new Map<AssetCategory, number>();
    return candidates.map(({ record, value, direction }, i) => {
        const categoryRanking = (perCategory.get(record.assetCategory) ?? 0) + 1;
        perCategory.set(record.assetCategory, categoryRanking);

        return {
            commodityName: record.commodityName,
            category: record.assetCategory,
            quoteDate: options.quoteDate,
            timeframe,
            ranking: i + 1,
            categoryRanking,
            supportingHorizons: [[rule.lead, rule.confirm]],
            direction,
            primaryPercent: value
        };
    });
}

export function classifyOpportunities(
    records: readonly QuoteRecord[],
    options: ClassifierOptions
): OpportunityBuckets {
    const out: OpportunityBuckets = { 'Short-term': [], 'Mid-term': [], 'Long-term': [] };
    for (const timeframe of OPPORTUNITY_TIMEFRAMES) {
        out[timeframe] = classifyBucket(records, timeframe, options);
    }
    return out;
}

export const flattenBuckets = (buckets: OpportunityBuckets): InvestmentOpportunity[] =>
    OPPORTUNITY_TIMEFRAMES.flatMap(timeframe => buckets[timeframe]);
