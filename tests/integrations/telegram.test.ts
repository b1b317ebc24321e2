/**
 * Telegram Bot API Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { TelegramApiError } from '@/lib/errors';
import { TelegramClient } from '@/lib/integrations/telegram';

function telegramResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('TelegramClient', () => {
  const fetchImpl = vi.fn<typeof fetch>();
  let client: TelegramClient;

  const lastCall = () => {
    const [url, init] = fetchImpl.mock.calls[fetchImpl.mock.calls.length - 1];
    return { url: String(url), body: JSON.parse(String(init?.body)) as unknown };
  };

  beforeEach(() => {
    fetchImpl.mockReset();
    client = new TelegramClient({ botToken: 'test-token', fetchImpl, timeoutMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should send HTML messages without link previews', async () => {
    fetchImpl.mockResolvedValue(telegramResponse({ ok: true, result: { message_id: 55, chat: { id: 1 } } }));

    const messageId = await client.sendMessage('100', '<b>hi</b>');

    expect(messageId).toBe(55);
    expect(lastCall()).toEqual({
      url: 'https://api.telegram.org/bottest-token/sendMessage',
      body: { chat_id: '100', text: '<b>hi</b>', parse_mode: 'HTML', disable_web_page_preview: true },
    });
  });

  it('should raise TelegramApiError with the API description', async () => {
    fetchImpl.mockResolvedValue(
      telegramResponse({ ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' }, 403)
    );

    const error = await client.sendMessage('100', 'hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TelegramApiError);
    expect(error).toMatchObject({
      method: 'sendMessage',
      errorCode: 403,
      message: 'Telegram sendMessage failed: Forbidden: bot was blocked by the user',
    });
  });

  it('should raise TelegramApiError on a non-JSON answer', async () => {
    fetchImpl.mockResolvedValue(new Response('Bad Gateway', { status: 502 }));

    await expect(client.deleteWebhook()).rejects.toThrow('Telegram deleteWebhook failed: unexpected response (HTTP 502)');
  });

  it('should time out a call that never answers', async () => {
    vi.useFakeTimers();
    fetchImpl.mockImplementation(
      (_input: unknown, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const pending = client.sendMessage('100', 'hi').catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(1000);

    expect(await pending).toMatchObject({ message: 'Telegram sendMessage failed: timed out after 1000ms' });
  });

  it('should skip malformed updates', async () => {
    fetchImpl.mockResolvedValue(
      telegramResponse({
        ok: true,
        result: [
          { update_id: 10, message: { message_id: 1, date: 1, chat: { id: 100, type: 'private' }, text: '/start' } },
          { update_id: 'eleven' },
        ],
      })
    );

    const updates = await client.getUpdates({ offset: 10, timeout: 30 });

    expect(updates.map((u) => u.update_id)).toEqual([10]);
    expect(lastCall().body).toEqual({ offset: 10, timeout: 30, limit: 100, allowed_updates: ['message'] });
  });

  it('should register a webhook with its secret', async () => {
    fetchImpl.mockResolvedValue(telegramResponse({ ok: true, result: true, description: 'Webhook was set' }));

    expect(await client.setWebhook('https://bot.example.com/api/telegram/webhook', 'test-secret')).toBe(true);
    expect(lastCall().body).toEqual({
      url: 'https://bot.example.com/api/telegram/webhook',
      allowed_updates: ['message'],
      secret_token: 'test-secret',
    });
  });
});
