/**
 * cli-table3 renderers for the daily reports.
 */

import Table from 'cli-table3';

import type { InvestmentOpportunity, QuoteRecord, RankedEntry, StrongLead, Timeframe } from '../../types';
import { signedPercent } from '../notifications/format';

// No ANSI colours so output stays readable when piped to a file
const PLAIN = { head: [], border: [] };

export const formatPercent = (value: number | null): string =>
    value === null ? 'n/a' : signedPercent(value);

/** "+3" moved up three places, "-3" moved down, "new" had no previous ranking. */
export function formatRankingChange(lead: Pick<StrongLead, 'rankingChange'>): string {
    if (lead.rankingChange === null) return 'new';
    return lead.rankingChange > 0 ? `+${lead.rankingChange}` : String(lead.rankingChange);
}

export function rankingTable(timeframe: Timeframe, entries: readonly RankedEntry[]): string {
    const table = new Table({ head: ['Asset', '#', 'Commodity', `${timeframe} %`], style: PLAIN });
    for (const e of entries) {
        table.push([e.category, String(e.rank), e.commodityName, formatPercent(e.percentValue)]);
    }
    return table.toString();
}

export function quotesTable(records: readonly QuoteRecord[]): string {
    const table = new Table({
        head: ['Asset', 'Commodity', 'Unit', 'Price', 'Daily %', 'Weekly %', 'Monthly %', 'Yearly %', 'Updated'],
        style: PLAIN
    });
    for (const r of records) {
        table.push([
            r.assetCategory,
            r.commodityName,
            r.unit,
            r.price.toFixed(2),
            formatPercent(r.pctDaily),
            formatPercent(r.pctWeekly),
            formatPercent(r.pctMonthly),
            formatPercent(r.pctYearly),
            r.sourceUpdate ?? '-'
        ]);
    }
    return table.toString();
}

export function strongLeadsTable(leads: readonly StrongLead[]): string {
    const table = new Table({
        head: ['Rank', 'Asset', 'Asset Rank', 'Commodity', 'Match', 'Rank Sum', 'Prev', 'Change'],
        style: PLAIN
    });
    for (const l of leads) {
        table.push([
            String(l.ranking),
            l.category,
            String(l.categoryRanking),
            l.commodityName,
            l.matchInfo,
            String(l.rankSum),
            l.previousRanking === null ? '-' : String(l.previousRanking),
            formatRankingChange(l)
        ]);
    }
    return table.toString();
}

export function rankingChangesTable(leads: readonly StrongLead[]): string {
    const table = new Table({ head: ['Commodity', 'Asset', 'Prev', 'Now', 'Change'], style: PLAIN });
    for (const l of leads) {
        table.push([
            l.commodityName,
            l.category,
            l.previousRanking === null ? '-' : String(l.previousRanking),
            String(l.ranking),
            formatRankingChange(l)
        ]);
    }
    return table.toString();
}

export function opportunitiesTable(opportunities: readonly InvestmentOpportunity[]): string {
    const table = new Table({
        head: ['Term', 'Rank', 'Asset', 'Asset Rank', 'Commodity', 'Direction', 'Move', 'Confirmed by'],
        style: PLAIN
    });
    for (const o of opportunities) {
        table.push([
            o.timeframe,
            String(o.ranking),
            o.category,
            String(o.categoryRanking),
            o.commodityName,
            o.direction === 'up' ? '▲ up' : '▼ down',
            formatPercent(o.primaryPercent),
            o.supportingHorizons.map(([lead, confirm]) => `${lead}/${confirm}`).join(', ')
        ]);
    }
    return table.toString();
}
