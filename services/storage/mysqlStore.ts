/**
 * MySQL snapshot store (drizzle-orm over mysql2).
 *
 * Each write runs delete-then-insert for the date inside one transaction and
 * records the run in `snapshot_runs`, so re-running a day replaces its rows.
 */

import { readFile } from 'node:fs/promises';

import { and, asc, desc, eq, lt } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/mysql2';
import type { MySql2Database } from 'drizzle-orm/mysql2';
import { createConnection, createPool } from 'mysql2/promise';
import type { Pool } from 'mysql2/promise';

import type { InvestmentOpportunity, QuoteRecord, RankedEntry, StrongLead } from '../../types';
import { AnalysisError, errorMessage } from '../utils/errors';
import {
  opportunityToRow,
  quoteToRow,
  rankingToRow,
  rowToOpportunity,
  rowToQuote,
  rowToRanking,
  rowToStrongLead,
  strongLeadToRow,
} from './rowMapping';
import {
  commoditiesDaily,
  investmentOpportunitiesDaily,
  rankingsDaily,
  snapshotRuns,
  strongLeadsDaily,
} from './schema';
import type { ReportName, SnapshotStore } from './types';

export interface DbSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

type Db = MySql2Database;
type Tx = Parameters<Parameters<Db['transaction']>[0]>[0];

const MIGRATION_URL = new URL('./migrations/0000_init.sql', import.meta.url);
const STATEMENT_BREAKPOINT = '--> statement-breakpoint';

export class MySqlSnapshotStore implements SnapshotStore {
  private constructor(
    private readonly pool: Pool,
    private readonly db: Db
  ) {}

  static connect(settings: DbSettings): MySqlSnapshotStore {
    const pool = createPool({
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
      connectionLimit: 4,
    });
    return new MySqlSnapshotStore(pool, drizzle(pool));
  }

  /** Creates the database itself when missing. Needs a server-level connection. */
  static async createDatabase(settings: DbSettings): Promise<void> {
    if (!/^\w+$/.test(settings.database)) {
      throw new AnalysisError('CONFIG_INVALID', `Invalid database name: ${settings.database}`);
    }
    const connection = await createConnection({
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
    });
    try {
      await connection.query(`CREATE DATABASE IF NOT EXISTS \`${settings.database}\``);
      console.log(`[Store] Database ${settings.database} ready`);
    } finally {
      await connection.end();
    }
  }

  async ensureSchema(): Promise<void> {
    const sqlText = await readFile(MIGRATION_URL, 'utf8');
    const statements = sqlText
      .split(STATEMENT_BREAKPOINT)
      .map(s => s.trim())
      .filter(s => s.length > 0);

    for (const statement of statements) {
      await this.pool.query(statement);
    }
    console.log(`[Store] Schema ready (${statements.length} statements)`);
  }

  private async replaceForDate(
    report: ReportName,
    date: string,
    rowCount: number,
    work: (tx: Tx) => Promise<void>
  ): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        await work(tx);
        await tx
          .insert(snapshotRuns)
          .values({ report, date, rowCount })
          .onDuplicateKeyUpdate({ set: { rowCount, writtenAt: new Date() } });
      });
      console.log(`[Store] Saved ${rowCount} ${report} rows for ${date}`);
    } catch (error) {
      throw new AnalysisError(
        'PERSISTENCE_FAILURE',
        `[Store] Failed to save ${report} for ${date}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async writeQuotes(date: string, rows: readonly QuoteRecord[]): Promise<void> {
    await this.replaceForDate('quotes', date, rows.length, async (tx) => {
      await tx.delete(commoditiesDaily).where(eq(commoditiesDaily.date, date));
      if (rows.length > 0) {
        await tx.insert(commoditiesDaily).values(rows.map(r => quoteToRow(date, r)));
      }
    });
  }

  async writeRankings(date: string, rows: readonly RankedEntry[]): Promise<void> {
    await this.replaceForDate('rankings', date, rows.length, async (tx) => {
      await tx.delete(rankingsDaily).where(eq(rankingsDaily.date, date));
      if (rows.length > 0) {
        await tx.insert(rankingsDaily).values(rows.map(r => rankingToRow(date, r)));
      }
    });
  }

  async writeStrongLeads(date: string, rows: readonly StrongLead[]): Promise<void> {
    await this.replaceForDate('strongLeads', date, rows.length, async (tx) => {
      await tx.delete(strongLeadsDaily).where(eq(strongLeadsDaily.date, date));
      if (rows.length > 0) {
        await tx.insert(strongLeadsDaily).values(rows.map(r => strongLeadToRow(date, r)));
      }
    });
  }

  async writeInvestmentOpportunities(date: string, rows: readonly InvestmentOpportunity[]): Promise<void> {
    await this.replaceForDate('investmentOpportunities', date, rows.length, async (tx) => {
      await tx.delete(investmentOpportunitiesDaily).where(eq(investmentOpportunitiesDaily.date, date));
      if (rows.length > 0) {
        await tx.insert(investmentOpportunitiesDaily).values(rows.map(r => opportunityToRow(date, r)));
      }
    });
  }

  async readQuotes(date: string): Promise<QuoteRecord[]> {
    const rows = await this.db
      .select()
      .from(commoditiesDaily)
      .where(eq(commoditiesDaily.date, date))
      .orderBy(asc(commoditiesDaily.id));
    return rows.map(rowToQuote);
  }

  async readRankings(date: string): Promise<RankedEntry[]> {
    const rows = await this.db
      .select()
      .from(rankingsDaily)
      .where(eq(rankingsDaily.date, date))
      .orderBy(asc(rankingsDaily.id));
    return rows.map(rowToRanking);
  }

  async readStrongLeads(date: string): Promise<StrongLead[]> {
    const rows = await this.db
      .select()
      .from(strongLeadsDaily)
      .where(eq(strongLeadsDaily.date, date))
      .orderBy(asc(strongLeadsDaily.ranking));
    return rows.map(rowToStrongLead);
  }

  async readInvestmentOpportunities(date: string): Promise<InvestmentOpportunity[]> {
    const rows = await this.db
      .select()
      .from(investmentOpportunitiesDaily)
      .where(eq(investmentOpportunitiesDaily.date, date))
      .orderBy(asc(investmentOpportunitiesDaily.id));
    return rows.map(rowToOpportunity);
  }

  async findPreviousSnapshotDate(report: ReportName, before: string): Promise<string | null> {
    const rows = await this.db
      .select({ date: snapshotRuns.date })
      .from(snapshotRuns)
      .where(and(eq(snapshotRuns.report, report), lt(snapshotRuns.date, before)))
      .orderBy(desc(snapshotRuns.date))
      .limit(1);
    return rows[0]?.date ?? null;
  }

  async listSnapshotDates(report: ReportName): Promise<string[]> {
    const rows = await this.db
      .select({ date: snapshotRuns.date })
      .from(snapshotRuns)
      .where(eq(snapshotRuns.report, report))
      .orderBy(asc(snapshotRuns.date));
    return rows.map(r => r.date);
  }

  async close(): Promise<void> {
    await this.pool.end();
    console.log('[Store] MySQL connection closed');
  }
}
