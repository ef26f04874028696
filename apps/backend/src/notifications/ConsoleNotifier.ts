/**
 * Console Notifier
 * Prints alerts to stdout; used when no Telegram credentials are configured
 */

import type { ChangeSummary, Decision } from '@trend-alert/shared';
import { formatAlert } from './formatAlert';
import type { NotificationSink } from './NotificationSink';

export class ConsoleNotifier implements NotificationSink {
  readonly name = 'console';

  async send(decision: Decision, changes: ChangeSummary): Promise<void> {
    console.log(`[Alert] ${decision.symbol}:${decision.timeframe}\n${formatAlert(decision, changes)}`);
  }
}
