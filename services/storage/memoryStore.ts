import type { InvestmentOpportunity, QuoteRecord, RankedEntry, StrongLead } from '../../types';
import type { ReportName, SnapshotStore } from './types';

type Tables = {
  quotes: Map<string, QuoteRecord[]>;
  rankings: Map<string, RankedEntry[]>;
  strongLeads: Map<string, StrongLead[]>;
  investmentOpportunities: Map<string, InvestmentOpportunity[]>;
};

/**
 * Process-local snapshot store. Used for dry runs and tests.
 * Rows are copied on the way in and out so stored snapshots stay immutable.
 */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly tables: Tables = {
    quotes: new Map(),
    rankings: new Map(),
    strongLeads: new Map(),
    investmentOpportunities: new Map(),
  };

  async writeQuotes(date: string, rows: readonly QuoteRecord[]): Promise<void> {
    this.tables.quotes.set(date, structuredClone([...rows]));
  }

  async writeRankings(date: string, rows: readonly RankedEntry[]): Promise<void> {
    this.tables.rankings.set(date, structuredClone([...rows]));
  }

  async writeStrongLeads(date: string, rows: readonly StrongLead[]): Promise<void> {
    this.tables.strongLeads.set(date, structuredClone([...rows]));
  }

  async writeInvestmentOpportunities(date: string, rows: readonly InvestmentOpportunity[]): Promise<void> {
    this.tables.investmentOpportunities.set(date, structuredClone([...rows]));
  }

  async readQuotes(date: string): Promise<QuoteRecord[]> {
    return structuredClone(this.tables.quotes.get(date) ?? []);
  }

  async readRankings(date: string): Promise<RankedEntry[]> {
    return structuredClone(this.tables.rankings.get(date) ?? []);
  }

  async readStrongLeads(date: string): Promise<StrongLead[]> {
    return structuredClone(this.tables.strongLeads.get(date) ?? []);
  }

  async readInvestmentOpportunities(date: string): Promise<InvestmentOpportunity[]> {
    return structuredClone(this.tables.investmentOpportunities.get(date) ?? []);
  }

  async findPreviousSnapshotDate(report: ReportName, before: string): Promise<string | null> {
    const earlier = (await this.listSnapshotDates(report)).filter(d => d < before);
    return earlier.length > 0 ? earlier[earlier.length - 1] : null;
  }

  async listSnapshotDates(report: ReportName): Promise<string[]> {
    return [...this.tables[report].keys()].sort();
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
