import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';

import { isTimeframe } from '../types';
import type { Timeframe } from '../types';
import { ANALYSIS } from '../config/analysisConfig';
import { isIsoDate } from '../services/utils/dates';
import { errorMessage } from '../services/utils/errors';
import type { SnapshotStore } from '../services/storage/types';
import { getOpportunities, getRankingChanges, getRankings, getStrongLeads, listSnapshots } from './reports';

type DateParams = { date: string };

const badRequest = (res: Response, error: string) => res.status(400).json({ error });

const readDate = (req: Request<DateParams>, res: Response): string | null => {
  const { date } = req.params;
  if (!isIsoDate(date)) {
    badRequest(res, `Invalid date "${date}", expected YYYY-MM-DD`);
    return null;
  }
  return date;
};

const fail = (res: Response, error: unknown) => {
  console.error('[API] Request failed:', error);
  res.status(500).json({ error: 'Failed to load report', details: errorMessage(error) });
};

export function createApp(store: SnapshotStore) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/api/snapshots', async (_req, res) => {
    try {
      res.json(await listSnapshots(store));
    } catch (error) {
      fail(res, error);
    }
  });

  app.get('/api/snapshots/:date/strong-leads', async (req: Request<DateParams>, res) => {
    const date = readDate(req, res);
    if (!date) return;
    try {
      res.json({ date, strongLeads: await getStrongLeads(store, date) });
    } catch (error) {
      fail(res, error);
    }
  });

  app.get('/api/snapshots/:date/opportunities', async (req: Request<DateParams>, res) => {
    const date = readDate(req, res);
    if (!date) return;
    try {
      res.json({ date, opportunities: await getOpportunities(store, date) });
    } catch (error) {
      fail(res, error);
    }
  });

  app.get('/api/snapshots/:date/rankings', async (req: Request<DateParams>, res) => {
    const date = readDate(req, res);
    if (!date) return;

    const raw = req.query.timeframe;
    let timeframe: Timeframe | undefined;
    if (raw !== undefined) {
      if (typeof raw !== 'string' || !isTimeframe(raw)) {
        badRequest(res, 'timeframe must be Daily, Weekly or Monthly');
        return;
      }
      timeframe = raw;
    }
    try {
      res.json({ date, rankings: await getRankings(store, date, timeframe) });
    } catch (error) {
      fail(res, error);
    }
  });

  app.get('/api/snapshots/:date/ranking-changes', async (req: Request<DateParams>, res) => {
    const date = readDate(req, res);
    if (!date) return;

    const { limit: rawLimit, movers } = req.query;
    const limit = typeof rawLimit === 'string' ? Number(rawLimit) : ANALYSIS.STRONG_LEADS.CHANGES_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      badRequest(res, 'limit must be a positive integer');
      return;
    }
    try {
      const changes = await getRankingChanges(store, date, { limit, moversOnly: movers !== 'false' });
      res.json({ date, changes });
    } catch (error) {
      fail(res, error);
    }
  });

  return app;
}
