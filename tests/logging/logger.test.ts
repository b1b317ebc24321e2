/**
 * Structured Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { Logger, generateCorrelationId, maskSensitiveData } from '@/lib/logging/logger';

describe('Logger', () => {
  let previousLevel: string | undefined;

  beforeEach(() => {
    previousLevel = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = 'info';
  });

  afterEach(() => {
    if (previousLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previousLevel;
    }
    vi.restoreAllMocks();
  });

  it('should write one JSON line with context fields', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger('reports').withCorrelationId('cid_test').withSubmitter('100');

    logger.info('Report stored', { verdict: 'phish' });

    expect(info).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Report stored',
      service: 'reports',
      correlationId: 'cid_test',
      submitterId: '100',
      verdict: 'phish',
    });
  });

  it('should drop entries below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    new Logger('bot').debug('noise');

    expect(debug).not.toHaveBeenCalled();
  });

  it('should serialize errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger('api').error('Update handling failed', new TypeError('bad'), { updateId: 5 });

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'error',
      updateId: 5,
      error: { name: 'TypeError', message: 'bad' },
    });
  });

  it('should mask credential fields', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new Logger('verifier').info('Lookup', { app_key: 'test-key', provider: 'PhishTank' });

    const entry = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry.app_key).toBe('[REDACTED]');
    expect(entry.provider).toBe('PhishTank');
  });

  it('should log duration and rethrow from time()', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('db');

    await expect(
      logger.time('Migration', async () => {
        throw new Error('locked');
      })
    ).rejects.toThrow('locked');

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({ message: 'Migration failed', success: false });
  });
});

describe('maskSensitiveData', () => {
  it('should mask nested keys and token-shaped strings', () => {
    expect(
      maskSensitiveData({
        headers: { Authorization: 'Bearer x', auth_key: 'k' },
        botToken: 'x',
        note: '123456789:ABCdefGHIjklMNOpqrSTUvwxYZ0123456789',
        url: 'https://example.com/',
      })
    ).toEqual({
      headers: { Authorization: '[REDACTED]', auth_key: '[REDACTED]' },
      botToken: '[REDACTED]',
      note: '[BOT_TOKEN_REDACTED]',
      url: 'https://example.com/',
    });
  });
});

describe('generateCorrelationId', () => {
  it('should produce distinct prefixed ids', () => {
    const a = generateCorrelationId();
    const b = generateCorrelationId();

    expect(a).toMatch(/^cid_[A-Za-z0-9_-]{21}$/);
    expect(a).not.toBe(b);
  });
});
