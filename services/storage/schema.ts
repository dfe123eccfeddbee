import {
  mysqlTable,
  int,
  varchar,
  date,
  double,
  json,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/mysql-core';

import type { HorizonPair, Timeframe } from '../../types';
import { UPDATE_LABEL_MAX_LENGTH } from '../utils/dates';

/**
 * Daily quote history, one row per commodity per run date.
 */
export const commoditiesDaily = mysqlTable(
  'commodities_daily',
  {
    id: int('id').autoincrement().primaryKey(),
    date: date('date', { mode: 'string' }).notNull(),
    asset: varchar('asset', { length: 50 }).notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    unit: varchar('unit', { length: 50 }).notNull(),
    price: double('price').notNull(),
    changeValue: double('change_value').notNull(),
    dailyPct: double('daily_pct'),
    weeklyPct: double('weekly_pct'),
    monthlyPct: double('monthly_pct'),
    yearlyPct: double('yearly_pct'),
    threeYearPct: double('three_year_pct'),
    updateDate: varchar('update_date', { length: UPDATE_LABEL_MAX_LENGTH }),
  },
  (table) => ({
    dateNameUnique: uniqueIndex('uq_commodities_daily_date_name').on(table.date, table.name),
    assetNameIdx: index('idx_commodities_daily_asset_name').on(table.asset, table.name),
  })
);

/**
 * Full per-category ranked table for Daily / Weekly / Monthly.
 */
export const rankingsDaily = mysqlTable(
  'rankings_daily',
  {
    id: int('id').autoincrement().primaryKey(),
    date: date('date', { mode: 'string' }).notNull(),
    timeframe: varchar('timeframe', { length: 10 }).notNull(),
    asset: varchar('asset', { length: 50 }).notNull(),
    rank: int('rank').notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    percentValue: double('percent_value').notNull(),
  },
  (table) => ({
    dateTimeframeNameUnique: uniqueIndex('uq_rankings_daily_date_tf_name').on(table.date, table.timeframe, table.name),
  })
);

export const strongLeadsDaily = mysqlTable(
  'strong_leads_daily',
  {
    id: int('id').autoincrement().primaryKey(),
    date: date('date', { mode: 'string' }).notNull(),
    ranking: int('ranking').notNull(),
    rankAsset: int('rank_asset').notNull(),
    asset: varchar('asset', { length: 50 }).notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    timeframes: json('timeframes').$type<Timeframe[]>().notNull(),
    rankSum: int('rank_sum').notNull(),
    matchInfo: varchar('match_info', { length: 50 }).notNull(),
    previousRanking: int('previous_ranking'),
    rankingChange: int('ranking_change'),
  },
  (table) => ({
    dateNameUnique: uniqueIndex('uq_strong_leads_daily_date_name').on(table.date, table.name),
    rankingIdx: index('idx_strong_leads_daily_ranking').on(table.ranking),
  })
);

export const investmentOpportunitiesDaily = mysqlTable(
  'investment_opportunities_daily',
  {
    id: int('id').autoincrement().primaryKey(),
    date: date('date', { mode: 'string' }).notNull(),
    timeframe: varchar('timeframe', { length: 20 }).notNull(),
    ranking: int('ranking').notNull(),
    rankAsset: int('rank_asset').notNull(),
    asset: varchar('asset', { length: 50 }).notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    direction: varchar('direction', { length: 4 }).notNull(),
    primaryPct: double('primary_pct').notNull(),
    supportingHorizons: json('supporting_horizons').$type<HorizonPair[]>().notNull(),
  },
  (table) => ({
    dateTimeframeNameUnique: uniqueIndex('uq_investment_opps_date_tf_name').on(table.date, table.timeframe, table.name),
    timeframeIdx: index('idx_investment_opps_timeframe').on(table.timeframe),
  })
);

/**
 * One row per (report, date) that has been written, including empty reports.
 * Prior-snapshot lookups go through this table so a day with zero strong leads
 * still counts as that day's snapshot.
 */
export const snapshotRuns = mysqlTable(
  'snapshot_runs',
  {
    id: int('id').autoincrement().primaryKey(),
    report: varchar('report', { length: 40 }).notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    rowCount: int('row_count').notNull(),
    writtenAt: timestamp('written_at').defaultNow().notNull(),
  },
  (table) => ({
    reportDateUnique: uniqueIndex('uq_snapshot_runs_report_date').on(table.report, table.date),
  })
);

export type CommodityDailyRow = typeof commoditiesDaily.$inferSelect;
export type RankingDailyRow = typeof rankingsDaily.$inferSelect;
export type StrongLeadDailyRow = typeof strongLeadsDaily.$inferSelect;
export type InvestmentOpportunityDailyRow = typeof investmentOpportunitiesDaily.$inferSelect;
