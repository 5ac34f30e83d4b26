import 'dotenv/config';
import { Command } from 'commander';
import { parseAsOfDateTime, formatISODate, previousSunday } from '../core/time';
import { loadConfig } from '../core/config';
import { errorCode, errorMessage } from '../core/errors';
import { RunSummary } from '../core/types';
import { appendEvent, getRunStatus, makeEvent } from '../journal/runJournal';
import { writeRunArtifact } from '../journal/storage';
import { createRebalanceDeps } from '../execution/dependencies';
import { RebalanceDeps, executeRebalance, runFailed } from '../execution/rebalanceRunner';

const program = new Command();

program
  .option('--asof <dateTime>', 'as-of timestamp (YYYY-MM-DD or YYYY-MM-DDTHH:mm, UTC); picks the leaderboard week')
  .option('--dry-run', 'reconcile and plan without placing orders or writing the ledger', false)
  .option('--force', 'rerun a run id that already completed', false)
  .option('--portfolio <name...>', 'only rebalance these portfolios');

export interface RunOptions {
  asof?: string;
  dryRun?: boolean;
  force?: boolean;
  portfolio?: string[];
  configPath?: string;
}

type RunCliOptions = { asof?: string; dryRun?: boolean; force?: boolean; portfolio?: string[] };

export const runRebalance = async (options: RunOptions): Promise<RunSummary | undefined> => {
  const { asOf, runId } = parseAsOfDateTime(options.asof);
  const status = getRunStatus(runId);
  if (!options.force && !options.dryRun && status !== 'UNKNOWN' && status !== 'FAILED') {
    console.log(`Run ${runId} already exists with status ${status}. Use --force to rerun.`);
    return undefined;
  }

  let deps: RebalanceDeps;
  try {
    deps = createRebalanceDeps(loadConfig(options.configPath));
  } catch (err) {
    // executeRebalance journals its own failures; this covers setup that never reached it.
    appendEvent(makeEvent(runId, 'RUN_FAILED', { code: errorCode(err), message: errorMessage(err) }));
    throw err;
  }
  const summary = await executeRebalance(deps, {
    runId,
    dryRun: options.dryRun,
    portfolios: options.portfolio,
    asOfDay: options.asof ? previousSunday(new Date(`${asOf}Z`)) : undefined
  });

  writeRunArtifact(runId, 'summary.json', summary);
  summary.portfolios.forEach((p) => {
    if (p.plan) writeRunArtifact(runId, `plan.${p.portfolioName}.json`, p.plan);
  });
  const line = summary.portfolios.map((p) => `${p.portfolioName}=${p.status}`).join(' ');
  console.log(`Run ${runId} finished ${formatISODate(new Date(summary.finishedAt))}: ${line}`);
  return summary;
};

const run = async () => {
  const opts = program.parse(process.argv).opts<RunCliOptions>();
  const summary = await runRebalance({
    asof: opts.asof,
    dryRun: opts.dryRun,
    force: opts.force,
    portfolio: opts.portfolio
  });
  if (summary && runFailed(summary)) {
    process.exitCode = 1;
  }
};

if (require.main === module) {
  run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
