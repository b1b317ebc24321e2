/**
 * Process-wide service wiring
 *
 * Each piece is built on first use so a route that only needs the
 * aggregator never asks for the bot token or the database.
 */

import { AlertDeduplicator } from '@/lib/alerts/dedup';
import { SlidingWindowRateLimiter } from '@/lib/api/rate-limiter';
import { UpdateRouter } from '@/lib/bot/router';
import { getConfig } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';
import { TelegramClient } from '@/lib/integrations/telegram';
import { Broadcaster } from '@/lib/notifications/broadcast';
import { ReportService } from '@/lib/reports/service';
import { NeonStore } from '@/lib/reports/storage';
import type { LinkwatchStore } from '@/lib/reports/types';
import { createAggregator, type VerdictAggregator } from '@/lib/threat-intel';

let _aggregator: VerdictAggregator | null = null;
let _submissionLimiter: SlidingWindowRateLimiter | null = null;
let _store: LinkwatchStore | null = null;
let _telegram: TelegramClient | null = null;
let _service: ReportService | null = null;
let _router: UpdateRouter | null = null;

export function getAggregator(): VerdictAggregator {
  if (!_aggregator) {
    _aggregator = createAggregator(getConfig());
  }
  return _aggregator;
}

/**
 * One window per submitter, shared by chat submissions and the check endpoint
 */
export function getSubmissionLimiter(): SlidingWindowRateLimiter {
  if (!_submissionLimiter) {
    const { rateLimit } = getConfig();
    _submissionLimiter = new SlidingWindowRateLimiter({
      maxRequests: rateLimit.maxSubmissions,
      windowMs: rateLimit.windowMs,
    });
  }
  return _submissionLimiter;
}

export function getStore(): LinkwatchStore {
  if (!_store) {
    _store = new NeonStore();
  }
  return _store;
}

export function getTelegramClient(): TelegramClient {
  if (!_telegram) {
    const { telegram } = getConfig();
    if (!telegram.botToken) {
      throw new ConfigurationError('TELEGRAM_BOT_TOKEN');
    }
    _telegram = new TelegramClient({ botToken: telegram.botToken });
  }
  return _telegram;
}

export function getReportService(): ReportService {
  if (!_service) {
    const config = getConfig();
    const store = getStore();
    _service = new ReportService({
      classifier: getAggregator(),
      reports: store,
      rateLimiter: getSubmissionLimiter(),
      dedup: new AlertDeduplicator(store, config.dedupWindowMs),
      broadcaster: new Broadcaster(getTelegramClient(), store, config.broadcast),
    });
  }
  return _service;
}

export function getUpdateRouter(): UpdateRouter {
  if (!_router) {
    _router = new UpdateRouter({
      sender: getTelegramClient(),
      service: getReportService(),
      store: getStore(),
      adminIds: getConfig().telegram.adminIds,
    });
  }
  return _router;
}

/**
 * Drop every cached instance (tests)
 */
export function resetAppContext(): void {
  _aggregator = null;
  _submissionLimiter = null;
  _store = null;
  _telegram = null;
  _service = null;
  _router = null;
}
