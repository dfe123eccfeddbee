import { describe, it, expect } from 'vitest';
import { MemorySnapshotStore } from '../../services/storage/memoryStore';
import { runDailyAnalysis } from '../../services/dailyAnalysis';
import {
    formatRankingChange,
    quotesTable,
    rankingChangesTable,
    strongLeadsTable
} from '../../services/reporting/tables';
import { getOpportunities, getRankingChanges, getRankings, listSnapshots } from '../../server/reports';
import { RUN_DATE, fiveMetals, makeLead, makeQuote } from './helpers';

describe('report queries', () => {
    const seeded = async () => {
        const store = new MemorySnapshotStore();
        await store.writeStrongLeads('2025-11-26', [makeLead({ commodityName: 'Silver', ranking: 1 })]);
        await runDailyAnalysis(RUN_DATE, fiveMetals(), { store });
        return store;
    };

    it('lists the stored dates per report', async () => {
        const index = await listSnapshots(await seeded());
        expect(index).toEqual({
            quotes: [RUN_DATE],
            rankings: [RUN_DATE],
            strongLeads: ['2025-11-26', RUN_DATE],
            investmentOpportunities: [RUN_DATE]
        });
    });

    it('filters rankings by timeframe', async () => {
        const weekly = await getRankings(await seeded(), RUN_DATE, 'Weekly');
        expect(weekly.map(e => e.commodityName)).toEqual(['Gold', 'Copper', 'Platinum', 'Silver', 'Lithium']);
    });

    it('groups opportunities into buckets', async () => {
        const buckets = await getOpportunities(await seeded(), RUN_DATE);
        expect(buckets['Short-term'].map(o => o.commodityName)).toEqual(['Gold', 'Silver', 'Platinum']);
        expect(buckets['Mid-term'].map(o => o.commodityName)).toEqual(['Gold', 'Copper', 'Platinum', 'Silver']);
        expect(buckets['Long-term']).toEqual([]);
    });

    it('returns movers against the stored baseline', async () => {
        const changes = await getRankingChanges(await seeded(), RUN_DATE, { moversOnly: true });
        expect(changes.map(l => [l.commodityName, l.previousRanking, l.ranking, l.rankingChange])).toEqual([
            ['Silver', 1, 3, -2]
        ]);
    });
});

describe('report tables', () => {
    it('formats ranking changes', () => {
        expect(formatRankingChange({ rankingChange: 3 })).toBe('+3');
        expect(formatRankingChange({ rankingChange: -3 })).toBe('-3');
        expect(formatRankingChange({ rankingChange: 0 })).toBe('0');
        expect(formatRankingChange({ rankingChange: null })).toBe('new');
    });

    it('renders one row per lead', () => {
        const leads = [
            makeLead({ commodityName: 'Lithium', ranking: 5, previousRanking: 2, rankingChange: -3 }),
            makeLead({ commodityName: 'Gold', ranking: 1 })
        ];

        const lines = rankingChangesTable(leads).split('\n');
        expect(lines).toHaveLength(7);
        expect(lines[3]).toMatch(/Lithium.*Metals.*2.*5.*-3/);
        expect(lines[5]).toMatch(/Gold.*Metals.*-.*1.*new/);
        expect(strongLeadsTable(leads)).toContain('2/3 (D,W)');
    });

    it('shows missing percentages as n/a', () => {
        const table = quotesTable([makeQuote({ pctDaily: 1.5 })]);
        expect(table).toContain('+1.50%');
        expect(table).toContain('n/a');
    });
});
