import crypto from 'crypto';
import express from 'express';
import { RunSummary } from '../core/types';
import { ConfigurationError, RunInProgressError, errorMessage } from '../core/errors';
import { getRecentRuns } from '../journal/runJournal';
import { RebalanceOptions, isRunInProgress, runFailed } from '../execution/rebalanceRunner';

export interface RouteOptions {
  trigger: (options: RebalanceOptions) => Promise<RunSummary>;
  /** When set, POST /rebalance requires a matching x-webhook-secret header. */
  secret?: string;
}

const secretMatches = (expected: string, provided: unknown) => {
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

export const registerRoutes = (app: express.Express, options: RouteOptions) => {
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', runInProgress: isRunInProgress() });
  });

  app.get('/runs', (req, res) => {
    const limit = Number(req.query.limit ?? 10);
    res.status(200).json(getRecentRuns(Number.isFinite(limit) && limit > 0 ? limit : 10));
  });

  app.post('/rebalance', async (req, res) => {
    if (options.secret && !secretMatches(options.secret, req.get('x-webhook-secret'))) {
      return res.status(401).json({ error: 'invalid webhook secret' });
    }
    const dryRun = req.query.dryRun === 'true' || req.query.dryRun === '1';
    try {
      const summary = await options.trigger({ dryRun });
      return res.status(runFailed(summary) ? 500 : 200).json(summary);
    } catch (err) {
      if (err instanceof RunInProgressError) {
        return res.status(409).json({ error: err.message, code: err.code });
      }
      const code = err instanceof ConfigurationError ? err.code : 'UNEXPECTED';
      console.error(`[server] Rebalance failed: ${errorMessage(err)}`);
      return res.status(500).json({ error: errorMessage(err), code });
    }
  });
};
