import { BotConfig } from '../core/types';
import { getBroker } from '../broker/broker';
import { getLeaderboard } from '../leaderboard/leaderboard';
import { getLedgerStore } from '../ledger/store';
import { fileJournal } from '../journal/runJournal';
import { getNotifier } from '../notifications/notifier';
import { RebalanceDeps } from './rebalanceRunner';

/** Wires the configured backends; the runner itself only sees interfaces. */
export const createRebalanceDeps = (config: BotConfig, env: NodeJS.ProcessEnv = process.env): RebalanceDeps => ({
  config,
  store: getLedgerStore(config),
  broker: getBroker(config, env),
  leaderboard: getLeaderboard(config, env),
  notifier: getNotifier(env),
  journal: fileJournal
});
