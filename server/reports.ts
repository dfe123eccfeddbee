/**
 * Read-side queries behind the HTTP API. Kept free of express so they can be
 * exercised against any SnapshotStore.
 */

import type { OpportunityBuckets, RankedEntry, StrongLead, Timeframe } from '../types';
import { OPPORTUNITY_TIMEFRAMES } from '../types';
import { rankingChanges } from '../services/ranking/strongLeads';
import type { RankingChangeOptions } from '../services/ranking/strongLeads';
import { REPORT_NAMES } from '../services/storage/types';
import type { ReportName, SnapshotStore } from '../services/storage/types';

export type SnapshotIndex = Record<ReportName, string[]>;

export async function listSnapshots(store: SnapshotStore): Promise<SnapshotIndex> {
  const index: SnapshotIndex = { quotes: [], rankings: [], strongLeads: [], investmentOpportunities: [] };
  for (const report of REPORT_NAMES) {
    index[report] = await store.listSnapshotDates(report);
  }
  return index;
}

export const getStrongLeads = (store: SnapshotStore, date: string): Promise<StrongLead[]> =>
  store.readStrongLeads(date);

export async function getOpportunities(store: SnapshotStore, date: string): Promise<OpportunityBuckets> {
  const rows = await store.readInvestmentOpportunities(date);
  const buckets: OpportunityBuckets = { 'Short-term': [], 'Mid-term': [], 'Long-term': [] };
  for (const timeframe of OPPORTUNITY_TIMEFRAMES) {
    buckets[timeframe] = rows.filter(o => o.timeframe === timeframe).sort((a, b) => a.ranking - b.ranking);
  }
  return buckets;
}

export async function getRankings(store: SnapshotStore, date: string, timeframe?: Timeframe): Promise<RankedEntry[]> {
  const rows = await store.readRankings(date);
  return timeframe ? rows.filter(e => e.timeframe === timeframe) : rows;
}

export async function getRankingChanges(
  store: SnapshotStore,
  date: string,
  options: RankingChangeOptions = {}
): Promise<StrongLead[]> {
  return rankingChanges(await store.readStrongLeads(date), options);
}
