/**
 * Domain Error Tests
 */

import { describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  HttpStatusError,
  HttpTimeoutError,
  ProviderUnavailableError,
  TelegramApiError,
  describeError,
} from '@/lib/errors';

describe('describeError', () => {
  it('should merge provider diagnostics', () => {
    expect(describeError(new ProviderUnavailableError('PhishTank', 'bad payload', { http: 200 }))).toEqual({
      error: 'bad payload',
      http: 200,
    });
  });

  it('should report the status of HTTP failures', () => {
    expect(describeError(new HttpStatusError(503, 'Service Unavailable'))).toEqual({
      error: 'HTTP 503: Service Unavailable',
      http: 503,
    });
  });

  it('should name the host on timeouts', () => {
    expect(describeError(new HttpTimeoutError('https://feeds.example.test/feed.txt?x=1', 500))).toEqual({
      error: 'Request to feeds.example.test timed out after 500ms',
      timeoutMs: 500,
    });
  });

  it('should stringify non-errors', () => {
    expect(describeError('offline')).toEqual({ error: 'offline' });
  });
});

describe('error messages', () => {
  it('should name the missing setting', () => {
    expect(new ConfigurationError('TELEGRAM_BOT_TOKEN').message).toBe('TELEGRAM_BOT_TOKEN is not configured');
  });

  it('should prefix Telegram failures with the method', () => {
    const error = new TelegramApiError('sendMessage', 'Forbidden: bot was blocked by the user', 403);

    expect(error.message).toBe('Telegram sendMessage failed: Forbidden: bot was blocked by the user');
    expect(error.errorCode).toBe(403);
  });
});
