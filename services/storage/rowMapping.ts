import { isAssetCategory, isOpportunityTimeframe, isTimeframe } from '../../types';
import type {
  AssetCategory,
  InvestmentOpportunity,
  MomentumDirection,
  OpportunityTimeframe,
  QuoteRecord,
  RankedEntry,
  StrongLead,
  Timeframe,
} from '../../types';
import { AnalysisError } from '../utils/errors';
import type {
  CommodityDailyRow,
  InvestmentOpportunityDailyRow,
  RankingDailyRow,
  StrongLeadDailyRow,
} from './schema';

type Insert<Row> = Omit<Row, 'id'>;

function corrupt(table: string, field: string, value: string): never {
  throw new AnalysisError('PERSISTENCE_FAILURE', `[Store] Unexpected ${field} "${value}" in ${table}`);
}

const toCategory = (table: string, value: string): AssetCategory =>
  isAssetCategory(value) ? value : corrupt(table, 'asset', value);

const toTimeframe = (table: string, value: string): Timeframe =>
  isTimeframe(value) ? value : corrupt(table, 'timeframe', value);

const toOpportunityTimeframe = (table: string, value: string): OpportunityTimeframe =>
  isOpportunityTimeframe(value) ? value : corrupt(table, 'timeframe', value);

const toDirection = (table: string, value: string): MomentumDirection =>
  value === 'up' || value === 'down' ? value : corrupt(table, 'direction', value);

// ============ QUOTES ============

export const quoteToRow = (date: string, q: QuoteRecord): Insert<CommodityDailyRow> => ({
  date,
  asset: q.assetCategory,
  name: q.commodityName,
  unit: q.unit,
  price: q.price,
  changeValue: q.changeAbsolute,
  dailyPct: q.pctDaily,
  weeklyPct: q.pctWeekly,
  monthlyPct: q.pctMonthly,
  yearlyPct: q.pctYearly,
  threeYearPct: q.pct3Year,
  updateDate: q.sourceUpdate,
});

export const rowToQuote = (row: CommodityDailyRow): QuoteRecord => ({
  assetCategory: toCategory('commodities_daily', row.asset),
  commodityName: row.name,
  unit: row.unit,
  price: row.price,
  changeAbsolute: row.changeValue,
  pctDaily: row.dailyPct,
  pctWeekly: row.weeklyPct,
  pctMonthly: row.monthlyPct,
  pctYearly: row.yearlyPct,
  pct3Year: row.threeYearPct,
  quoteDate: row.date,
  sourceUpdate: row.updateDate,
});

// ============ RANKINGS ============

export const rankingToRow = (date: string, e: RankedEntry): Insert<RankingDailyRow> => ({
  date,
  timeframe: e.timeframe,
  asset: e.category,
  rank: e.rank,
  name: e.commodityName,
  percentValue: e.percentValue,
});

export const rowToRanking = (row: RankingDailyRow): RankedEntry => ({
  commodityName: row.name,
  category: toCategory('rankings_daily', row.asset),
  timeframe: toTimeframe('rankings_daily', row.timeframe),
  rank: row.rank,
  percentValue: row.percentValue,
});

// ============ STRONG LEADS ============

export const strongLeadToRow = (date: string, l: StrongLead): Insert<StrongLeadDailyRow> => ({
  date,
  ranking: l.ranking,
  rankAsset: l.categoryRanking,
  asset: l.category,
  name: l.commodityName,
  timeframes: l.timeframesQualified,
  rankSum: l.rankSum,
  matchInfo: l.matchInfo,
  previousRanking: l.previousRanking,
  rankingChange: l.rankingChange,
});

export const rowToStrongLead = (row: StrongLeadDailyRow): StrongLead => ({
  commodityName: row.name,
  category: toCategory('strong_leads_daily', row.asset),
  quoteDate: row.date,
  ranking: row.ranking,
  categoryRanking: row.rankAsset,
  previousRanking: row.previousRanking,
  rankingChange: row.rankingChange,
  timeframesQualified: row.timeframes.map(t => toTimeframe('strong_leads_daily', t)),
  rankSum: row.rankSum,
  matchInfo: row.matchInfo,
});

// ============ INVESTMENT OPPORTUNITIES ============

export const opportunityToRow = (date: string, o: InvestmentOpportunity): Insert<InvestmentOpportunityDailyRow> => ({
  date,
  timeframe: o.timeframe,
  ranking: o.ranking,
  rankAsset: o.categoryRanking,
  asset: o.category,
  name: o.commodityName,
  direction: o.direction,
  primaryPct: o.primaryPercent,
  supportingHorizons: o.supportingHorizons,
});

export const rowToOpportunity = (row: InvestmentOpportunityDailyRow): InvestmentOpportunity => ({
  commodityName: row.name,
  category: toCategory('investment_opportunities_daily', row.asset),
  quoteDate: row.date,
  timeframe: toOpportunityTimeframe('investment_opportunities_daily', row.timeframe),
  ranking: row.ranking,
  categoryRanking: row.rankAsset,
  supportingHorizons: row.supportingHorizons,
  direction: toDirection('investment_opportunities_daily', row.direction),
  primaryPercent: row.primaryPct,
});
