import { RunSummary } from '../core/types';
import { errorMessage } from '../core/errors';
import { ConsoleNotifier } from './consoleNotifier';
import { Notifier, RunFailure } from './notifier.types';
import { WebhookNotifier } from './webhookNotifier';

export class MultiNotifier implements Notifier {
  readonly name = 'multi';

  constructor(private notifiers: Notifier[]) {}

  async notify(summary: RunSummary): Promise<void> {
    this.report(await Promise.allSettled(this.notifiers.map((n) => n.notify(summary))));
  }

  async notifyError(failure: RunFailure): Promise<void> {
    this.report(await Promise.allSettled(this.notifiers.map((n) => n.notifyError(failure))));
  }

  private report(results: PromiseSettledResult<void>[]) {
    results.forEach((r, idx) => {
      if (r.status === 'rejected') {
        console.error(`[notify] ${this.notifiers[idx].name} failed: ${errorMessage(r.reason)}`);
      }
    });
  }
}

export const getNotifier = (env: NodeJS.ProcessEnv = process.env): Notifier => {
  const notifiers: Notifier[] = [new ConsoleNotifier()];
  if (env.NOTIFY_WEBHOOK_URL) notifiers.push(new WebhookNotifier(env.NOTIFY_WEBHOOK_URL));
  return new MultiNotifier(notifiers);
};

export { ConsoleNotifier, WebhookNotifier };
export type { Notifier, RunFailure };
