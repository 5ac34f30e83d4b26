import { JournalEvent, JournalEventType } from '../core/types';
import { safeUuid } from '../core/utils';
import { appendJournalEvent, readEventsForRun, readJournalEvents } from './storage';

export type JournalFn = (runId: string, type: JournalEventType, details?: Record<string, unknown>) => void;

export const makeEvent = (runId: string, type: JournalEventType, details?: Record<string, unknown>): JournalEvent => ({
  id: safeUuid('evt'),
  runId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export const appendEvent = (event: JournalEvent) => {
  appendJournalEvent(event);
};

export const fileJournal: JournalFn = (runId, type, details) => appendEvent(makeEvent(runId, type, details));

export const noopJournal: JournalFn = () => undefined;

export type RunStatus = 'IN_PROGRESS' | 'COMPLETED' | 'PARTIAL' | 'FAILED' | 'REJECTED' | 'UNKNOWN';

export const getRunStatus = (runId: string): RunStatus => {
  const events = readEventsForRun(runId);
  const last = events
    .filter((e) => e.type.startsWith('RUN_'))
    .sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime())
    .at(-1);
  if (!last) return 'UNKNOWN';
  switch (last.type) {
    case 'RUN_COMPLETED':
      return last.details?.partial === true ? 'PARTIAL' : 'COMPLETED';
    case 'RUN_REJECTED':
      return 'REJECTED';
    case 'RUN_FAILED':
      return 'FAILED';
    case 'RUN_STARTED':
      return 'IN_PROGRESS';
    default:
      return 'UNKNOWN';
  }
};

export const getRecentRuns = (limit = 10): { runId: string; status: RunStatus; lastEventAt: string }[] => {
  const latest = new Map<string, number>();
  for (const evt of readJournalEvents()) {
    const ts = new Date(evt.timestamp).getTime();
    const existing = latest.get(evt.runId);
    if (existing === undefined || ts > existing) latest.set(evt.runId, ts);
  }
  return Array.from(latest.entries())
    .sort(([, a], [, b]) => b - a)
    .slice(0, limit)
    .map(([runId, ts]) => ({ runId, status: getRunStatus(runId), lastEventAt: new Date(ts).toISOString() }));
};

export const getEventsForRun = readEventsForRun;
