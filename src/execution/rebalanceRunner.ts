import {
  BotConfig,
  JournalEventType,
  LedgerState,
  PortfolioConfig,
  PortfolioRunStatus,
  PortfolioRunSummary,
  PortfolioView,
  RebalancePlan,
  RunSummary,
  SkippedLeg
} from '../core/types';
import { ConfigurationError, RunInProgressError, errorCode, errorMessage } from '../core/errors';
import { assertPortfolioTopology, enabledPortfolios } from '../core/config';
import { parseAsOfDateTime } from '../core/time';
import { withTimeout } from '../core/utils';
import { Broker } from '../broker/broker.types';
import { LeaderboardSource } from '../leaderboard/leaderboard.types';
import { LedgerStore } from '../ledger/ledgerStore.types';
import { MemoryLedgerStore } from '../ledger/memoryStore';
import { OwnershipLedger } from '../ledger/ownershipLedger';
import { averageCost, hasTraded, ownershipRecords, unconsumedExternalSales } from '../ledger/ownership';
import { JournalFn, noopJournal } from '../journal/runJournal';
import { Notifier } from '../notifications/notifier.types';
import { apportionPositions } from '../reconcile/allocator';
import { PositionReconcileResult, reconcilePositions } from '../reconcile/positionReconciler';
import { reconcileTradeHistory } from '../reconcile/tradeHistoryReconciler';
import { computePerformance } from '../analytics/performance';
import { OwnedHolding, planRebalance } from './rebalancePlanner';
import { emptyExecutionResult, executePlan } from './executionEngine';

export interface RebalanceDeps {
  config: BotConfig;
  store: LedgerStore;
  broker: Broker;
  leaderboard: LeaderboardSource;
  notifier?: Notifier;
  journal?: JournalFn;
  now?: () => Date;
}

export interface RebalanceOptions {
  dryRun?: boolean;
  runId?: string;
  /** Only these portfolios (by name); defaults to every enabled portfolio. */
  portfolios?: string[];
  /** Leaderboard week (YYYY-MM-DD); the source picks its default when absent. */
  asOfDay?: string;
}

let activeRunId: string | undefined;

export const isRunInProgress = () => activeRunId !== undefined;

const selectPortfolios = (config: BotConfig, names?: string[]): PortfolioConfig[] => {
  const enabled = enabledPortfolios(config);
  if (!names || !names.length) return enabled;
  const unknown = names.filter((n) => !enabled.some((p) => p.portfolioName === n));
  if (unknown.length) {
    throw new ConfigurationError('Unknown or disabled portfolio', unknown);
  }
  return enabled.filter((p) => names.includes(p.portfolioName));
};

const statusOf = (summary: PortfolioRunSummary, executorSkips: number): PortfolioRunStatus => {
  if (executorSkips > 0) return 'PARTIAL';
  return summary.executed.length ? 'COMPLETED' : 'NOOP';
};

const failedSummary = (portfolioName: string, err: unknown, previous: string[] = []): PortfolioRunSummary => ({
  portfolioName,
  status: 'FAILED',
  previous,
  current: [],
  executed: [],
  skipped: [],
  externalSales: [],
  mismatches: [],
  proceeds: 0,
  invested: 0,
  ledger: [],
  error: { code: errorCode(err), message: errorMessage(err) }
});

interface PortfolioContext {
  deps: RebalanceDeps;
  ledger: OwnershipLedger;
  /** Ledger as it stood when positions were apportioned. */
  state: LedgerState;
  view: PortfolioView;
  dryRun: boolean;
  asOfDay?: string;
  journal: (type: JournalEventType, details?: Record<string, unknown>) => void;
}

const runPortfolio = async (portfolio: PortfolioConfig, ctx: PortfolioContext): Promise<PortfolioRunSummary> => {
  const { deps, ledger, state, view } = ctx;
  const { config, broker, leaderboard } = deps;
  const name = portfolio.portfolioName;
  const now = deps.now ?? (() => new Date());
  const previous = state.snapshots[name]?.symbols ?? [];
  ctx.journal('PORTFOLIO_STARTED', { portfolioName: name, indexId: portfolio.indexId });

  let current: string[];
  let reconciled: PositionReconcileResult | undefined;
  let plan: RebalancePlan | undefined;
  const execution = emptyExecutionResult();
  try {
    current = await withTimeout(
      leaderboard.fetchTopN(portfolio.indexId, config.topN, ctx.asOfDay),
      config.brokerTimeoutMs,
      `${leaderboard.name} leaderboard`
    );
  } catch (err) {
    console.error(`[${name}] Leaderboard unavailable: ${errorMessage(err)}`);
    ctx.journal('PORTFOLIO_FAILED', { portfolioName: name, code: errorCode(err), message: errorMessage(err) });
    return failedSummary(name, err, previous);
  }

  try {
    reconciled = await reconcilePositions({ portfolioName: name, view, state, ledger, broker, now: now() });
    reconciled.externalSales.forEach((sale) => ctx.journal('EXTERNAL_SALE_DETECTED', { ...sale }));

    const afterReconcile = await ledger.state();
    const owned: Record<string, OwnedHolding> = {};
    for (const record of ownershipRecords(afterReconcile, name)) {
      let estPrice = averageCost(record);
      // Only leavers are priced here; the executor quotes buys itself.
      if (previous.includes(record.symbol) && !current.includes(record.symbol)) {
        try {
          estPrice = await broker.getCurrentPrice(record.symbol);
        } catch (err) {
          console.warn(`[${name}] No quote for ${record.symbol}, estimating at average cost: ${errorMessage(err)}`);
        }
      }
      owned[record.symbol] = { quantity: record.quantity, estPrice };
    }

    plan = planRebalance({
      portfolioName: name,
      previous,
      current,
      owned,
      heldNotOwned: reconciled.heldNotOwned,
      externalSales: unconsumedExternalSales(afterReconcile, name),
      hasTraded: hasTraded(afterReconcile, name),
      initialCapital: portfolio.initialCapital,
      minOrderNotional: config.minOrderNotionalUSD
    });
    ctx.journal('PLAN_CREATED', {
      portfolioName: name,
      kind: plan.kind,
      sells: plan.sells.map((s) => s.symbol),
      buys: plan.buys.map((b) => b.symbol),
      availableCapital: plan.availableCapital
    });
    console.log(
      `[${name}] Plan ${plan.kind}: sell [${plan.sells.map((s) => s.symbol).join(', ')}] buy [${plan.buys
        .map((b) => b.symbol)
        .join(', ')}]`
    );

    await executePlan(
      plan,
      broker,
      ledger,
      {
        dryRun: ctx.dryRun,
        minOrderNotional: config.minOrderNotionalUSD,
        now,
        journal: (type, details) => ctx.journal(type, { portfolioName: name, ...details })
      },
      execution
    );

    const planSkips: SkippedLeg[] = plan.skipped.map((s) => ({ ...s, code: s.reason }));
    const finalState = await ledger.state();
    const summary: PortfolioRunSummary = {
      portfolioName: name,
      status: 'NOOP',
      previous,
      current,
      plan,
      executed: execution.executed,
      skipped: [...planSkips, ...execution.skipped],
      externalSales: reconciled.externalSales,
      mismatches: reconciled.mismatches,
      proceeds: execution.proceeds,
      invested: execution.invested,
      ledger: ownershipRecords(finalState, name)
    };
    summary.status = statusOf(summary, execution.skipped.length);
    summary.performance = await computePerformance(finalState, name, portfolio.initialCapital, (symbol) =>
      broker.getCurrentPrice(symbol)
    );

    // A partial run keeps the old snapshot so the next trigger recomputes the same rotation.
    if (!ctx.dryRun && (summary.status === 'COMPLETED' || summary.status === 'NOOP')) {
      await ledger.saveSnapshot({
        portfolioName: name,
        indexId: portfolio.indexId,
        symbols: current,
        capturedAt: now().toISOString()
      });
    }
    ctx.journal('PORTFOLIO_COMPLETED', {
      portfolioName: name,
      status: summary.status,
      executed: summary.executed.length,
      skipped: summary.skipped.length
    });
    return summary;
  } catch (err) {
    if (!execution.executed.length) {
      console.error(`[${name}] Rebalance failed: ${errorMessage(err)}`);
      ctx.journal('PORTFOLIO_FAILED', { portfolioName: name, code: errorCode(err), message: errorMessage(err) });
      return { ...failedSummary(name, err, previous), current };
    }
    // Orders already placed stay in the summary; the old snapshot makes the next run pick up the rest.
    console.error(`[${name}] Rebalance stopped after ${execution.executed.length} executed leg(s): ${errorMessage(err)}`);
    ctx.journal('PORTFOLIO_COMPLETED', {
      portfolioName: name,
      status: 'PARTIAL',
      executed: execution.executed.length,
      code: errorCode(err),
      message: errorMessage(err)
    });
    let ledgerRecords: PortfolioRunSummary['ledger'] = [];
    try {
      ledgerRecords = ownershipRecords(await ledger.state(), name);
    } catch (readErr) {
      console.error(`[${name}] Could not read the ledger for the summary: ${errorMessage(readErr)}`);
    }
    return {
      portfolioName: name,
      status: 'PARTIAL',
      previous,
      current,
      plan,
      executed: execution.executed,
      skipped: [...(plan?.skipped ?? []).map((s) => ({ ...s, code: s.reason })), ...execution.skipped],
      externalSales: reconciled?.externalSales ?? [],
      mismatches: reconciled?.mismatches ?? [],
      proceeds: execution.proceeds,
      invested: execution.invested,
      ledger: ledgerRecords,
      error: { code: errorCode(err), message: errorMessage(err) }
    };
  }
};

/**
 * One rebalance across every selected portfolio. Configuration problems throw before the broker
 * is touched; anything later is reported per portfolio in the summary.
 */
export const executeRebalance = async (deps: RebalanceDeps, options: RebalanceOptions = {}): Promise<RunSummary> => {
  const now = deps.now ?? (() => new Date());
  const runId = options.runId ?? parseAsOfDateTime(now().toISOString()).runId;
  const journalFn = deps.journal ?? noopJournal;
  // The journal is an audit trail; losing an entry must not stop orders already under way.
  const journal = (type: JournalEventType, details?: Record<string, unknown>) => {
    try {
      journalFn(runId, type, details);
    } catch (err) {
      console.error(`[run ${runId}] Journal write failed for ${type}: ${errorMessage(err)}`);
    }
  };

  if (activeRunId !== undefined) {
    journal('RUN_REJECTED', { activeRunId });
    throw new RunInProgressError(activeRunId);
  }
  activeRunId = runId;
  try {
    const dryRun = Boolean(options.dryRun);
    assertPortfolioTopology(deps.config, deps.store.persistent);
    const portfolios = selectPortfolios(deps.config, options.portfolios);
    const startedAt = now().toISOString();
    journal('RUN_STARTED', { dryRun, portfolios: portfolios.map((p) => p.portfolioName) });
    console.log(`[run ${runId}] Rebalancing ${portfolios.map((p) => p.portfolioName).join(', ')}${dryRun ? ' (dry run)' : ''}`);

    const summary: RunSummary = { runId, startedAt, finishedAt: startedAt, dryRun, portfolios: [], mismatches: [] };
    try {
      // A dry run works on a throwaway copy so reconciliation and simulated legs never reach the store.
      const store = dryRun ? new MemoryLedgerStore(await deps.store.snapshot()) : deps.store;
      const ledger = new OwnershipLedger(store);

      const history = await reconcileTradeHistory(ledger, deps.broker, {
        lookbackDays: deps.config.tradeHistoryLookbackDays,
        toleranceMinutes: deps.config.tradeMatchToleranceMinutes,
        graceMinutes: deps.config.unfilledGraceMinutes,
        portfolioNames: portfolios.map((p) => p.portfolioName),
        now: now()
      });
      summary.mismatches.push(...history.mismatches);
      journal('TRADE_HISTORY_RECONCILED', {
        examined: history.examined,
        matched: history.matched,
        mismatches: history.mismatches.map((m) => m.code)
      });

      const state = await ledger.state();
      const positions = await deps.broker.getPositions();
      const views = apportionPositions(
        state,
        positions,
        portfolios.map((p) => p.portfolioName),
        deps.config.quantityDecimals
      );

      for (const portfolio of portfolios) {
        summary.portfolios.push(
          await runPortfolio(portfolio, {
            deps,
            ledger,
            state,
            view: views[portfolio.portfolioName],
            dryRun,
            asOfDay: options.asOfDay,
            journal
          })
        );
      }
    } catch (err) {
      // Shared inputs (store snapshot, broker positions): nothing can be reconciled without them.
      console.error(`[run ${runId}] Shared input unavailable: ${errorMessage(err)}`);
      const done = new Set(summary.portfolios.map((p) => p.portfolioName));
      portfolios
        .filter((p) => !done.has(p.portfolioName))
        .forEach((p) => {
          journal('PORTFOLIO_FAILED', { portfolioName: p.portfolioName, code: errorCode(err), message: errorMessage(err) });
          summary.portfolios.push(failedSummary(p.portfolioName, err));
        });
    }

    summary.finishedAt = now().toISOString();
    const statuses = summary.portfolios.map((p) => p.status);
    journal('RUN_COMPLETED', {
      statuses: Object.fromEntries(summary.portfolios.map((p) => [p.portfolioName, p.status])),
      partial: statuses.some((s) => s === 'PARTIAL' || s === 'FAILED')
    });

    if (deps.notifier) {
      const notifier = deps.notifier;
      void notifier.notify(summary).catch((err: unknown) => {
        console.error(`[run ${runId}] Notification via ${notifier.name} failed: ${errorMessage(err)}`);
      });
    }
    return summary;
  } catch (err) {
    journal('RUN_FAILED', { code: errorCode(err), message: errorMessage(err) });
    if (deps.notifier) {
      const notifier = deps.notifier;
      void notifier.notifyError({ runId, code: errorCode(err), message: errorMessage(err) }).catch((notifyErr: unknown) => {
        console.error(`[run ${runId}] Error notification via ${notifier.name} failed: ${errorMessage(notifyErr)}`);
      });
    }
    throw err;
  } finally {
    activeRunId = undefined;
  }
};

export const runFailed = (summary: RunSummary) => summary.portfolios.some((p) => p.status === 'FAILED');
