/**
 * Notification Sink
 * Where alert-worthy decisions are delivered
 */

import type { ChangeSummary, Decision } from '@trend-alert/shared';

export interface NotificationSink {
  readonly name: string;
  /**
   * @throws on delivery failure; callers log and count it
   */
  send(decision: Decision, changes: ChangeSummary): Promise<void>;
}
