
// ============ CATEGORIES & HORIZONS ============

export const ASSET_CATEGORIES = ['Energy', 'Metals', 'Agriculture', 'Livestock', 'Industrial'] as const;
export type AssetCategory = typeof ASSET_CATEGORIES[number];

/** Timeframes the ranking engine ranks on. */
export const TIMEFRAMES = ['Daily', 'Weekly', 'Monthly'] as const;
export type Timeframe = typeof TIMEFRAMES[number];

/** Every percentage-change window published on the quote table. */
export type Horizon = Timeframe | 'Yearly' | '3-Year';
export type HorizonPair = [Horizon, Horizon];

export type PercentField = 'pctDaily' | 'pctWeekly' | 'pctMonthly' | 'pctYearly' | 'pct3Year';

export const PERCENT_FIELD: Record<Horizon, PercentField> = {
  Daily: 'pctDaily',
  Weekly: 'pctWeekly',
  Monthly: 'pctMonthly',
  Yearly: 'pctYearly',
  '3-Year': 'pct3Year',
};

export const OPPORTUNITY_TIMEFRAMES = ['Short-term', 'Mid-term', 'Long-term'] as const;
export type OpportunityTimeframe = typeof OPPORTUNITY_TIMEFRAMES[number];

export const isAssetCategory = (value: string): value is AssetCategory =>
  (ASSET_CATEGORIES as readonly string[]).includes(value);

export const isTimeframe = (value: string): value is Timeframe =>
  (TIMEFRAMES as readonly string[]).includes(value);

export const isOpportunityTimeframe = (value: string): value is OpportunityTimeframe =>
  (OPPORTUNITY_TIMEFRAMES as readonly string[]).includes(value);

// ============ QUOTES ============

export interface QuoteRecord {
  assetCategory: AssetCategory;
  commodityName: string;
  unit: string;
  price: number;
  changeAbsolute: number;
  pctDaily: number | null;
  pctWeekly: number | null;
  pctMonthly: number | null;
  pctYearly: number | null;
  pct3Year: number | null;
  quoteDate: string; // YYYY-MM-DD (run date)
  sourceUpdate: string | null; // last-update label from the page, resolved to YYYY-MM-DD when it is a date
}

export interface MalformedRecord {
  rowIndex: number;
  commodityName: string | null;
  reason: string;
}

// ============ DERIVED REPORTS ============

export interface RankedEntry {
  commodityName: string;
  category: AssetCategory;
  timeframe: Timeframe;
  rank: number; // 1-based within category
  percentValue: number;
}

export type TimeframeRankings = Record<Timeframe, RankedEntry[]>;

export interface StrongLead {
  commodityName: string;
  category: AssetCategory;
  quoteDate: string;
  ranking: number;
  categoryRanking: number;
  previousRanking: number | null;
  rankingChange: number | null; // previousRanking - ranking, positive = moved up
  timeframesQualified: Timeframe[];
  rankSum: number;
  matchInfo: string; // e.g. "2/3 (D,W)"
}

export type MomentumDirection = 'up' | 'down';

export interface InvestmentOpportunity {
  commodityName: string;
  category: AssetCategory;
  quoteDate: string;
  timeframe: OpportunityTimeframe;
  ranking: number;
  categoryRanking: number;
  supportingHorizons: HorizonPair[];
  direction: MomentumDirection;
  primaryPercent: number;
}

export type OpportunityBuckets = Record<OpportunityTimeframe, InvestmentOpportunity[]>;

// ============ ALERTS ============

export type ChannelKind = 'email' | 'sms' | 'webhook';

export interface Subscription {
  commodityName: string;
  minPercentChange: number;
  email?: string;
  smsAddress?: string; // email-to-SMS gateway address, e.g. 5550100@vtext.com
  webhookUrl?: string;
}

export interface Subscriber {
  channel: ChannelKind;
  address: string;
}

export interface AlertEvent {
  commodityName: string;
  category: AssetCategory;
  unit: string;
  price: number;
  pctDaily: number;
  pctWeekly: number | null;
  quoteDate: string;
  threshold: number;
  subscriber: Subscriber;
}
