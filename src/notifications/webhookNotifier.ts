import { RunSummary } from '../core/types';
import { SourceUnavailableError } from '../core/errors';
import { Notifier, RunFailure } from './notifier.types';
import { failureSubject, formatRunFailure, formatRunSummary, summarySubject } from './templates';

export class WebhookNotifier implements Notifier {
  readonly name = 'webhook';

  constructor(private url: string) {}

  async notify(summary: RunSummary): Promise<void> {
    await this.post({ subject: summarySubject(summary), text: formatRunSummary(summary), summary });
  }

  async notifyError(failure: RunFailure): Promise<void> {
    await this.post({ subject: failureSubject(failure), text: formatRunFailure(failure), failure });
  }

  private async post(payload: Record<string, unknown>) {
    const resp = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload)
    });
    if (!resp.ok) {
      throw new SourceUnavailableError('notifier', `webhook responded ${resp.status}`);
    }
  }
}
