import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ensureDir, writeJSONFile } from '../core/utils';
import { JournalEvent } from '../core/types';

const journalEventSchema = z.object({
  id: z.string(),
  runId: z.string(),
  timestamp: z.string(),
  type: z.enum([
    'RUN_STARTED',
    'RUN_REJECTED',
    'TRADE_HISTORY_RECONCILED',
    'PORTFOLIO_STARTED',
    'EXTERNAL_SALE_DETECTED',
    'PLAN_CREATED',
    'ORDER_SUBMITTED',
    'ORDER_FAILED',
    'PORTFOLIO_COMPLETED',
    'PORTFOLIO_FAILED',
    'RUN_COMPLETED',
    'RUN_FAILED'
  ]),
  details: z.record(z.string(), z.unknown()).optional()
});

export const getJournalFile = () =>
  process.env.JOURNAL_FILE
    ? path.resolve(process.env.JOURNAL_FILE)
    : path.join(path.resolve(process.cwd(), 'journal'), 'events.jsonl');

const runsDir = () => path.resolve(process.env.RUNS_DIR || path.join(process.cwd(), 'runs'));

export const appendJournalEvent = (event: JournalEvent) => {
  const journalFile = getJournalFile();
  ensureDir(path.dirname(journalFile));
  fs.appendFileSync(journalFile, `${JSON.stringify(event)}\n`);
};

const parseLine = (line: string): JournalEvent | undefined => {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    // a torn final line from a crashed writer; everything before it is intact
    return undefined;
  }
  const parsed = journalEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
};

export const readJournalEvents = (): JournalEvent[] => {
  const journalFile = getJournalFile();
  if (!fs.existsSync(journalFile)) return [];
  const content = fs.readFileSync(journalFile, 'utf-8').trim();
  const lines = content.length ? content.split('\n') : [];
  return lines.map(parseLine).filter((v): v is JournalEvent => Boolean(v));
};

export const readEventsForRun = (runId: string): JournalEvent[] => readJournalEvents().filter((e) => e.runId === runId);

export const runArtifactPath = (runId: string, fileName: string) => path.join(runsDir(), runId, fileName);

export const writeRunArtifact = (runId: string, fileName: string, data: unknown) => {
  const runDir = path.join(runsDir(), runId);
  ensureDir(runDir);
  writeJSONFile(path.join(runDir, fileName), data);
};
