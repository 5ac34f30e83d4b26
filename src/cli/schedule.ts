import 'dotenv/config';
import cron from 'node-cron';
import { BotConfig } from '../core/types';
import { loadConfig } from '../core/config';
import { ConfigurationError, RunInProgressError, errorMessage } from '../core/errors';
import { isMarketOpenWindow, parseAsOfDateTime } from '../core/time';
import { writeRunArtifact } from '../journal/storage';
import { createRebalanceDeps } from '../execution/dependencies';
import { RebalanceDeps, executeRebalance } from '../execution/rebalanceRunner';

let job: cron.ScheduledTask | null = null;
let lastRunResult = 'never';

export const schedulerStatus = () => ({ scheduled: job !== null, lastRunResult });

/** One timer tick: honours the market-open guard, then runs a rebalance. */
export const runScheduledRebalance = async (deps: RebalanceDeps, now = new Date()): Promise<string> => {
  const { schedule } = deps.config;
  if (schedule.marketOpenGuard && !isMarketOpenWindow(now, schedule.rebalanceDay, schedule.timezone)) {
    console.log(`[schedule] ${now.toISOString()} is outside the ${schedule.rebalanceDay} market-open window; skipping.`);
    return 'skipped: outside market-open window';
  }
  const { runId } = parseAsOfDateTime(now.toISOString());
  try {
    const summary = await executeRebalance(deps, { runId });
    writeRunArtifact(runId, 'summary.json', summary);
    return summary.portfolios.map((p) => `${p.portfolioName}=${p.status}`).join(' ');
  } catch (err) {
    if (err instanceof RunInProgressError) {
      console.warn(`[schedule] ${err.message}; skipping this tick.`);
      return 'skipped: run in progress';
    }
    throw err;
  }
};

export const startScheduler = (config: BotConfig, deps: RebalanceDeps = createRebalanceDeps(config)) => {
  if (job) {
    console.log('[schedule] Already running');
    return job;
  }
  if (!cron.validate(config.schedule.cron)) {
    throw new ConfigurationError(`Invalid cron expression: ${config.schedule.cron}`);
  }
  job = cron.schedule(
    config.schedule.cron,
    () => {
      runScheduledRebalance(deps)
        .then((result) => {
          lastRunResult = result;
        })
        .catch((err: unknown) => {
          console.error('[schedule] Rebalance failed:', err);
          lastRunResult = `error: ${errorMessage(err)}`;
        });
    },
    { timezone: config.schedule.timezone }
  );
  console.log(`[schedule] Rebalance scheduled "${config.schedule.cron}" (${config.schedule.timezone})`);
  return job;
};

export const stopScheduler = () => {
  job?.stop();
  job = null;
};

if (require.main === module) {
  try {
    startScheduler(loadConfig());
  } catch (err) {
    console.error(err);
    process.exitCode = 1;
  }
}
