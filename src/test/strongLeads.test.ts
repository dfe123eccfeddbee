import { describe, it, expect } from 'vitest';
import { detectStrongLeads, formatMatchInfo, rankingChanges } from '../../services/ranking/strongLeads';
import { RUN_DATE, fiveMetals, makeLead, makeQuote } from './helpers';

describe('Strong Lead Detector', () => {
    it('keeps commodities in the top 3 of at least two timeframes', () => {
        const leads = detectStrongLeads(fiveMetals(), [], { quoteDate: RUN_DATE });

        expect(leads.map(l => [l.ranking, l.commodityName, l.matchInfo, l.rankSum])).toEqual([
            [1, 'Gold', '3/3 (D,W,M)', 4],
            [2, 'Platinum', '3/3 (D,W,M)', 7],
            [3, 'Silver', '2/3 (D,M)', 5]
        ]);
        expect(leads.every(l => l.timeframesQualified.length >= 2)).toBe(true);
    });

    it('numbers leads within their category', () => {
        const records = [
            ...fiveMetals(),
            makeQuote({ assetCategory: 'Energy', commodityName: 'Brent', pctDaily: 2, pctWeekly: 2, pctMonthly: 2 }),
            makeQuote({ assetCategory: 'Energy', commodityName: 'Crude Oil', pctDaily: 1, pctWeekly: 1, pctMonthly: 1 })
        ];

        const leads = detectStrongLeads(records, [], { quoteDate: RUN_DATE });

        expect(leads.map(l => [l.commodityName, l.category, l.categoryRanking])).toEqual([
            ['Brent', 'Energy', 1],
            ['Gold', 'Metals', 1],
            ['Crude Oil', 'Energy', 2],
            ['Platinum', 'Metals', 2],
            ['Silver', 'Metals', 3]
        ]);
    });

    it('computes day-over-day change against the previous snapshot', () => {
        const previous = [
            makeLead({ commodityName: 'Gold', ranking: 1 }),
            makeLead({ commodityName: 'Lithium', ranking: 2 })
        ];

        const leads = detectStrongLeads(fiveMetals(), previous, {
            quoteDate: RUN_DATE,
            topK: 5,
            minTimeframes: 3
        });

        const lithium = leads.find(l => l.commodityName === 'Lithium');
        expect(lithium).toMatchObject({ ranking: 5, previousRanking: 2, rankingChange: -3 });

        const gold = leads.find(l => l.commodityName === 'Gold');
        expect(gold).toMatchObject({ ranking: 1, previousRanking: 1, rankingChange: 0 });

        const platinum = leads.find(l => l.commodityName === 'Platinum');
        expect(platinum).toMatchObject({ ranking: 2, previousRanking: null, rankingChange: null });
    });

    it('treats a missing previous snapshot as no previous rankings', () => {
        const leads = detectStrongLeads(fiveMetals(), [], { quoteDate: RUN_DATE });
        expect(leads.every(l => l.previousRanking === null && l.rankingChange === null)).toBe(true);
    });

    it('formats match info in timeframe order', () => {
        expect(formatMatchInfo(['Daily', 'Monthly'])).toBe('2/3 (D,M)');
    });

    describe('rankingChanges', () => {
        const leads = [
            makeLead({ commodityName: 'A', ranking: 1, rankingChange: 1 }),
            makeLead({ commodityName: 'B', ranking: 2, rankingChange: -3 }),
            makeLead({ commodityName: 'C', ranking: 3, rankingChange: null }),
            makeLead({ commodityName: 'D', ranking: 4, rankingChange: 0 })
        ];

        it('orders by absolute change with new entries last', () => {
            expect(rankingChanges(leads).map(l => l.commodityName)).toEqual(['B', 'A', 'D', 'C']);
        });

        it('can keep only movers and cap the list', () => {
            expect(rankingChanges(leads, { moversOnly: true }).map(l => l.commodityName)).toEqual(['B', 'A']);
            expect(rankingChanges(leads, { limit: 1 }).map(l => l.commodityName)).toEqual(['B']);
        });
    });
});
