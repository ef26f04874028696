/**
 * Telegram Notifier
 * Delivers alerts through the Bot API sendMessage method
 */

import type { ChangeSummary, Decision } from '@trend-alert/shared';
import { formatAlert } from './formatAlert';
import type { NotificationSink } from './NotificationSink';

export interface TelegramNotifierConfig {
  botToken: string;
  chatId: string;
  baseUrl?: string;
  timeout?: number;
}

interface TelegramResponse {
  ok: boolean;
  description?: string;
}

function isTelegramResponse(value: unknown): value is TelegramResponse {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

export class TelegramNotifier implements NotificationSink {
  readonly name = 'telegram';
  private readonly baseUrl: string;
  private readonly timeout: number;

  constructor(private readonly config: TelegramNotifierConfig) {
    this.baseUrl = config.baseUrl || 'https://api.telegram.org';
    this.timeout = config.timeout || 10000; // 10s default
  }

  async send(decision: Decision, changes: ChangeSummary): Promise<void> {
    const url = `${this.baseUrl}/bot${this.config.botToken}/sendMessage`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.config.chatId,
          text: formatAlert(decision, changes),
          parse_mode: 'Markdown',
          disable_web_page_preview: true,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Telegram API error: ${response.status} - ${errorText}`);
      }

      const body: unknown = await response.json();
      if (!isTelegramResponse(body) || !body.ok) {
        const description = isTelegramResponse(body) ? body.description : undefined;
        throw new Error(`Telegram API error: ${description ?? 'unexpected response'}`);
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error('Telegram API timeout');
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
