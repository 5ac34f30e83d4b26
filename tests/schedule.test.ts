import fs from 'fs';
import { StubBroker } from '../src/broker/broker.stub';
import { ConfigurationError } from '../src/core/errors';
import { StubLeaderboard } from '../src/leaderboard/leaderboard.stub';
import { MemoryLedgerStore } from '../src/ledger/memoryStore';
import { runArtifactPath } from '../src/journal/storage';
import { RebalanceDeps, executeRebalance } from '../src/execution/rebalanceRunner';
import { runScheduledRebalance, schedulerStatus, startScheduler, stopScheduler } from '../src/cli/schedule';
import { fixedClock, makeConfig, tmpDir } from './fixtures';

const makeDeps = (overrides: Record<string, unknown> = {}): RebalanceDeps => ({
  config: makeConfig(overrides),
  store: new MemoryLedgerStore(),
  broker: new StubBroker({}, { syntheticPrices: true, now: fixedClock() }),
  leaderboard: new StubLeaderboard({ '13': ['FIX', 'EME', 'CSL', 'WSM', 'RS'] }),
  now: fixedClock()
});

describe('scheduled rebalance', () => {
  const savedRunsDir = process.env.RUNS_DIR;

  beforeEach(() => {
    process.env.RUNS_DIR = tmpDir('schedule');
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    stopScheduler();
    if (savedRunsDir === undefined) delete process.env.RUNS_DIR;
    else process.env.RUNS_DIR = savedRunsDir;
  });

  it('skips ticks outside the market-open window', async () => {
    const deps = makeDeps();
    await expect(runScheduledRebalance(deps, new Date('2026-01-06T14:30:00Z'))).resolves.toBe(
      'skipped: outside market-open window'
    );
    expect((await deps.store.snapshot()).trades).toEqual([]);
  });

  it('runs inside the window and stores the summary', async () => {
    const deps = makeDeps();

    const result = await runScheduledRebalance(deps, new Date('2026-01-05T14:31:00Z'));

    expect(result).toBe('alpha=COMPLETED');
    const summary = JSON.parse(fs.readFileSync(runArtifactPath('2026-01-05T14-31', 'summary.json'), 'utf-8'));
    expect(summary.runId).toBe('2026-01-05T14-31');
  });

  it('runs any time when the guard is off', async () => {
    const deps = makeDeps({ schedule: { marketOpenGuard: false } });
    await expect(runScheduledRebalance(deps, new Date('2026-01-08T20:00:00Z'))).resolves.toBe('alpha=COMPLETED');
  });

  it('skips a tick while another run is active', async () => {
    const deps = makeDeps();
    const active = executeRebalance(deps, { runId: 'manual' });

    await expect(runScheduledRebalance(deps, new Date('2026-01-05T14:30:00Z'))).resolves.toBe('skipped: run in progress');
    await active;
  });

  it('validates the cron expression before scheduling', () => {
    const deps = makeDeps({ schedule: { cron: 'every monday' } });
    expect(() => startScheduler(deps.config, deps)).toThrow(ConfigurationError);
    expect(schedulerStatus()).toEqual({ scheduled: false, lastRunResult: 'never' });
  });

  it('schedules and stops a job', () => {
    const deps = makeDeps();
    startScheduler(deps.config, deps);
    expect(schedulerStatus().scheduled).toBe(true);
    stopScheduler();
    expect(schedulerStatus().scheduled).toBe(false);
  });
});
