/**
 * Telegram Bot API Integration
 *
 * Thin client over fetch for the handful of methods the bot uses.
 * Every call is bounded by a timeout; ok=false answers raise TelegramApiError.
 */

import { z } from 'zod';
import { TelegramApiError } from '@/lib/errors';
import { loggers } from '@/lib/logging/logger';
import { updateSchema, type TelegramUpdate } from '@/lib/api/schemas';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const sentMessageSchema = z
  .object({
    message_id: z.number(),
  })
  .passthrough();

export interface TelegramClientConfig {
  botToken: string;
  timeoutMs?: number;
  apiBase?: string;
  fetchImpl?: typeof fetch;
}

export interface SendMessageOptions {
  parseMode?: 'HTML' | 'MarkdownV2';
  disableWebPagePreview?: boolean;
  replyToMessageId?: number;
}

export interface GetUpdatesOptions {
  offset?: number;
  /** Long-poll duration in seconds */
  timeout?: number;
  limit?: number;
}

export class TelegramClient {
  private readonly timeoutMs: number;
  private readonly apiBase: string;
  private readonly log = loggers.bot;

  constructor(private readonly config: TelegramClientConfig) {
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.apiBase = config.apiBase ?? TELEGRAM_API_BASE;
  }

  async sendMessage(chatId: string, text: string, options: SendMessageOptions = {}): Promise<number> {
    const result = await this.call('sendMessage', {
      chat_id: chatId,
      text,
      parse_mode: options.parseMode ?? 'HTML',
      disable_web_page_preview: options.disableWebPagePreview ?? true,
      ...(options.replyToMessageId !== undefined ? { reply_to_message_id: options.replyToMessageId } : {}),
    });
    return sentMessageSchema.parse(result).message_id;
  }

  /**
   * Fetch pending updates. Items that fail validation are skipped.
   */
  async getUpdates(options: GetUpdatesOptions = {}): Promise<TelegramUpdate[]> {
    const pollSeconds = options.timeout ?? 0;
    const result = await this.call(
      'getUpdates',
      {
        ...(options.offset !== undefined ? { offset: options.offset } : {}),
        timeout: pollSeconds,
        limit: options.limit ?? 100,
        allowed_updates: ['message'],
      },
      this.timeoutMs + pollSeconds * 1000
    );

    const items = z.array(z.unknown()).parse(result);
    const updates: TelegramUpdate[] = [];
    for (const item of items) {
      const parsed = updateSchema.safeParse(item);
      if (parsed.success) {
        updates.push(parsed.data);
      } else {
        this.log.warn('Skipping malformed update', { issues: parsed.error.issues.length });
      }
    }
    return updates;
  }

  async setWebhook(url: string, secretToken?: string): Promise<boolean> {
    const result = await this.call('setWebhook', {
      url,
      allowed_updates: ['message'],
      ...(secretToken ? { secret_token: secretToken } : {}),
    });
    return result === true;
  }

  async deleteWebhook(dropPendingUpdates = false): Promise<boolean> {
    const result = await this.call('deleteWebhook', { drop_pending_updates: dropPendingUpdates });
    return result === true;
  }

  private async call(method: string, payload: Record<string, unknown>, timeoutMs = this.timeoutMs): Promise<unknown> {
    const fetchImpl = this.config.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let status: number;
    let body: unknown;
    try {
      const response = await fetchImpl(`${this.apiBase}/bot${this.config.botToken}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      status = response.status;
      body = await response.json().catch(() => null);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TelegramApiError(method, `timed out after ${timeoutMs}ms`);
      }
      throw new TelegramApiError(method, error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TelegramApiError(method, `unexpected response (HTTP ${status})`, status);
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(
        method,
        envelope.data.description ?? 'request rejected',
        envelope.data.error_code ?? status
      );
    }
    return envelope.data.result;
  }
}
