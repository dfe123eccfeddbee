import type { QuoteRecord, StrongLead } from '../../types';

export const RUN_DATE = '2025-11-28';

export const makeQuote = (overrides: Partial<QuoteRecord> = {}): QuoteRecord => ({
    assetCategory: 'Metals',
    commodityName: 'Gold',
    unit: 'USD/t.oz',
    price: 100,
    changeAbsolute: 1,
    pctDaily: null,
    pctWeekly: null,
    pctMonthly: null,
    pctYearly: null,
    pct3Year: null,
    quoteDate: RUN_DATE,
    sourceUpdate: null,
    ...overrides
});

/** Metals quote with the three ranked timeframes set. */
export const metal = (commodityName: string, daily: number, weekly: number, monthly: number): QuoteRecord =>
    makeQuote({ commodityName, pctDaily: daily, pctWeekly: weekly, pctMonthly: monthly });

export const makeLead = (overrides: Partial<StrongLead> = {}): StrongLead => ({
    commodityName: 'Gold',
    category: 'Metals',
    quoteDate: RUN_DATE,
    ranking: 1,
    categoryRanking: 1,
    previousRanking: null,
    rankingChange: null,
    timeframesQualified: ['Daily', 'Weekly'],
    rankSum: 3,
    matchInfo: '2/3 (D,W)',
    ...overrides
});

/**
 * Five metals where every commodity ranks in all three timeframes once the cut-off is
 * five. Rank sums: Gold 4, Platinum 7, Silver 9, Copper 10, Lithium 15.
 */
export const fiveMetals = (): QuoteRecord[] => [
    metal('Gold', 4, 5, 3),
    metal('Silver', 3, 1, 2),
    metal('Copper', 0.5, 3, 1),
    metal('Platinum', 2, 2, 4),
    metal('Lithium', 0.1, -5, 0.5)
];
