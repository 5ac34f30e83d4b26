import fs from 'fs';
import path from 'path';
import { fileJournal, getEventsForRun, getRecentRuns, getRunStatus } from '../src/journal/runJournal';
import { getJournalFile, readJournalEvents, runArtifactPath, writeRunArtifact } from '../src/journal/storage';
import { tmpDir } from './fixtures';

describe('run journal', () => {
  const saved = { JOURNAL_FILE: process.env.JOURNAL_FILE, RUNS_DIR: process.env.RUNS_DIR };
  let dir: string;

  beforeEach(() => {
    dir = tmpDir('journal');
    process.env.JOURNAL_FILE = path.join(dir, 'events.jsonl');
    process.env.RUNS_DIR = path.join(dir, 'runs');
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('appends events and reads them back per run', () => {
    fileJournal('run-1', 'RUN_STARTED', { dryRun: false });
    fileJournal('run-2', 'RUN_STARTED');
    fileJournal('run-1', 'RUN_COMPLETED', { partial: false });

    expect(getJournalFile()).toBe(path.join(dir, 'events.jsonl'));
    expect(getEventsForRun('run-1').map((e) => [e.type, e.details])).toEqual([
      ['RUN_STARTED', { dryRun: false }],
      ['RUN_COMPLETED', { partial: false }]
    ]);
    expect(getRunStatus('run-1')).toBe('COMPLETED');
    expect(getRunStatus('run-2')).toBe('IN_PROGRESS');
    expect(getRunStatus('run-3')).toBe('UNKNOWN');
  });

  it('derives partial, failed and rejected runs from the last run event', () => {
    fileJournal('partial', 'RUN_STARTED');
    fileJournal('partial', 'PORTFOLIO_FAILED', { portfolioName: 'alpha' });
    fileJournal('partial', 'RUN_COMPLETED', { partial: true });
    fileJournal('failed', 'RUN_FAILED', { code: 'CONFIGURATION_ERROR' });
    fileJournal('rejected', 'RUN_REJECTED', { activeRunId: 'partial' });

    expect(getRunStatus('partial')).toBe('PARTIAL');
    expect(getRunStatus('failed')).toBe('FAILED');
    expect(getRunStatus('rejected')).toBe('REJECTED');
    expect(getRecentRuns(2)).toHaveLength(2);
  });

  it('skips a torn line', () => {
    fileJournal('run-1', 'RUN_STARTED');
    fs.appendFileSync(getJournalFile(), '{"id":"evt-x","runId":"run-1"');

    expect(readJournalEvents()).toHaveLength(1);
  });

  it('writes run artifacts under the runs directory', () => {
    writeRunArtifact('run-1', 'summary.json', { ok: true });

    const file = runArtifactPath('run-1', 'summary.json');
    expect(file).toBe(path.join(dir, 'runs', 'run-1', 'summary.json'));
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({ ok: true });
  });
});
