import type { InvestmentOpportunity, QuoteRecord, RankedEntry, StrongLead } from '../../types';

export const REPORT_NAMES = ['quotes', 'rankings', 'strongLeads', 'investmentOpportunities'] as const;
export type ReportName = typeof REPORT_NAMES[number];

/**
 * Date-keyed snapshot persistence.
 *
 * Every write replaces the rows stored for that date as one unit, so re-running a
 * day never duplicates rows and a failed write leaves the previous rows in place.
 * A write with no rows still records that the report ran for the date.
 */
export interface SnapshotStore {
  writeQuotes(date: string, rows: readonly QuoteRecord[]): Promise<void>;
  writeRankings(date: string, rows: readonly RankedEntry[]): Promise<void>;
  writeStrongLeads(date: string, rows: readonly StrongLead[]): Promise<void>;
  writeInvestmentOpportunities(date: string, rows: readonly InvestmentOpportunity[]): Promise<void>;

  readQuotes(date: string): Promise<QuoteRecord[]>;
  readRankings(date: string): Promise<RankedEntry[]>;
  /** Empty when nothing was stored for the date. */
  readStrongLeads(date: string): Promise<StrongLead[]>;
  readInvestmentOpportunities(date: string): Promise<InvestmentOpportunity[]>;

  /** Most recent date strictly before `before` for which the report was written. */
  findPreviousSnapshotDate(report: ReportName, before: string): Promise<string | null>;
  listSnapshotDates(report: ReportName): Promise<string[]>;

  close(): Promise<void>;
}
