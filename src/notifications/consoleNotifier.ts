import { RunSummary } from '../core/types';
import { Notifier, RunFailure } from './notifier.types';
import { formatRunFailure, formatRunSummary } from './templates';

export class ConsoleNotifier implements Notifier {
  readonly name = 'console';

  async notify(summary: RunSummary): Promise<void> {
    console.log(formatRunSummary(summary));
  }

  async notifyError(failure: RunFailure): Promise<void> {
    console.error(formatRunFailure(failure));
  }
}
