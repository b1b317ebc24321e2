/**
 * Rate Limiting Tests
 * Sliding window per submitter
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  SlidingWindowRateLimiter,
  createRateLimiter,
  getRateLimitHeaders,
} from '@/lib/api/rate-limiter';

const T0 = new Date('2026-03-01T12:00:00.000Z');

describe('Rate Limiting', () => {
  let limiter: SlidingWindowRateLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    limiter = createRateLimiter({ maxRequests: 5, windowMs: 60_000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('allow', () => {
    it('should accept N submissions and reject the next one', () => {
      const results = Array.from({ length: 6 }, () => limiter.allow('chat-1'));

      expect(results).toEqual([true, true, true, true, true, false]);
    });

    it('should accept 5 submissions spread over 60 seconds and reject the 6th', () => {
      for (let i = 0; i < 5; i++) {
        expect(limiter.allow('chat-1')).toBe(true);
        vi.advanceTimersByTime(10_000);
      }

      expect(limiter.allow('chat-1')).toBe(false);
    });

    it('should track submitters independently', () => {
      for (let i = 0; i < 5; i++) {
        limiter.allow('chat-1');
      }

      expect(limiter.allow('chat-1')).toBe(false);
      expect(limiter.allow('chat-2')).toBe(true);
    });

    it('should keep a timestamp exactly at the window edge', () => {
      for (let i = 0; i < 5; i++) {
        limiter.allow('chat-1');
      }

      vi.advanceTimersByTime(60_000);
      expect(limiter.allow('chat-1')).toBe(false);

      vi.advanceTimersByTime(1);
      expect(limiter.allow('chat-1')).toBe(true);
    });

    it('should not record rejected attempts', () => {
      for (let i = 0; i < 5; i++) {
        limiter.allow('chat-1');
      }

      vi.advanceTimersByTime(50_000);
      expect(limiter.allow('chat-1')).toBe(false);
      expect(limiter.allow('chat-1')).toBe(false);
      expect(limiter.allow('chat-1')).toBe(false);

      vi.advanceTimersByTime(10_001);
      const results = Array.from({ length: 6 }, () => limiter.allow('chat-1'));

      expect(results).toEqual([true, true, true, true, true, false]);
    });
  });

  describe('consume', () => {
    it('should report remaining capacity', () => {
      expect(limiter.consume('chat-1')).toEqual({ allowed: true, remaining: 4, limit: 5 });
      expect(limiter.consume('chat-1')).toEqual({ allowed: true, remaining: 3, limit: 5 });
    });

    it('should include retryAfter when rejected', () => {
      for (let i = 0; i < 5; i++) {
        limiter.consume('chat-1');
      }

      vi.advanceTimersByTime(20_000);

      expect(limiter.consume('chat-1')).toEqual({
        allowed: false,
        remaining: 0,
        limit: 5,
        retryAfter: 41,
      });
    });
  });

  describe('retryAfter', () => {
    it('should be 0 while under the limit', () => {
      limiter.allow('chat-1');

      expect(limiter.retryAfter('chat-1')).toBe(0);
    });

    it('should count seconds until the oldest submission leaves the window', () => {
      for (let i = 0; i < 5; i++) {
        limiter.allow('chat-1');
      }

      expect(limiter.retryAfter('chat-1')).toBe(61);

      vi.advanceTimersByTime(59_500);
      expect(limiter.retryAfter('chat-1')).toBe(1);
    });
  });

  describe('reset and cleanup', () => {
    it('should forget a submitter on reset', () => {
      for (let i = 0; i < 5; i++) {
        limiter.allow('chat-1');
      }

      limiter.reset('chat-1');

      expect(limiter.allow('chat-1')).toBe(true);
    });

    it('should drop submitters with nothing left in the window', () => {
      limiter.allow('chat-1');
      limiter.allow('chat-2');
      vi.advanceTimersByTime(30_000);
      limiter.allow('chat-3');
      vi.advanceTimersByTime(30_001);

      expect(limiter.cleanup()).toBe(2);
      expect(limiter.size).toBe(1);
    });
  });

  describe('getRateLimitHeaders', () => {
    it('should add Retry-After only when rejected', () => {
      expect(getRateLimitHeaders({ allowed: true, remaining: 4, limit: 5 })).toEqual({
        'X-RateLimit-Limit': '5',
        'X-RateLimit-Remaining': '4',
      });
      expect(getRateLimitHeaders({ allowed: false, remaining: 0, limit: 5, retryAfter: 12 })).toEqual({
        'X-RateLimit-Limit': '5',
        'X-RateLimit-Remaining': '0',
        'Retry-After': '12',
      });
    });
  });
});
