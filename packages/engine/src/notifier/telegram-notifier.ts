/**
 * Telegram Notifier
 *
 * Delivers the rendered report through the Bot API `sendMessage` method.
 * Long reports are split and sent in order.
 */

import { z } from 'zod';
import { NotifyError, type AggregateReport, type Notifier, type NotifyAck } from '@netsnap/core';
import { chunkMessage, renderReport } from '../report.js';

export const TELEGRAM_API_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 10000;

export interface TelegramNotifierConfig {
  botToken: string;
  chatId: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const sendMessageResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  description: z.string().optional(),
});

export class TelegramNotifier implements Notifier {
  private config: TelegramNotifierConfig;
  private fetchImpl: typeof fetch;

  constructor(config: TelegramNotifierConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async send(report: AggregateReport): Promise<NotifyAck> {
    const messageIds: string[] = [];
    for (const chunk of chunkMessage(renderReport(report))) {
      messageIds.push(await this.sendMessage(chunk));
    }
    console.log(`[Netsnap:Notify] Telegram notification sent (${messageIds.length} message(s))`);
    return { messageIds };
  }

  private async sendMessage(text: string): Promise<string> {
    const baseUrl = (this.config.apiBaseUrl ?? TELEGRAM_API_BASE_URL).replace(/\/$/, '');
    const url = `${baseUrl}/bot${this.config.botToken}/sendMessage`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.config.chatId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      // never surface the request URL: it contains the bot token
      throw new NotifyError(error instanceof Error ? error.message : String(error));
    }

    const body: unknown = await response.json().catch(() => undefined);
    const parsed = sendMessageResponseSchema.safeParse(body);

    if (!response.ok || !parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : undefined;
      throw new NotifyError(
        `Telegram API responded ${response.status}${description ? `: ${description}` : ''}`,
      );
    }

    return parsed.data.result ? String(parsed.data.result.message_id) : '';
  }
}
