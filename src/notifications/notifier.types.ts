import { RunSummary } from '../core/types';

export interface RunFailure {
  runId: string;
  code: string;
  message: string;
}

export interface Notifier {
  readonly name: string;
  notify(summary: RunSummary): Promise<void>;
  /** A run that aborted before producing a summary. */
  notifyError(failure: RunFailure): Promise<void>;
}
