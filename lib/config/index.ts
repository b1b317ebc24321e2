/**
 * Runtime configuration
 *
 * Parsed once from the environment. Provider credentials are optional: a
 * missing key degrades only that provider's verdict to `unknown`.
 */

import { z } from 'zod';
import { loggers } from '@/lib/logging/logger';

const log = loggers.config;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const configSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  WEBHOOK_URL: optionalString,
  ADMIN_IDS: z.string().optional(),
  DATABASE_URL: optionalString,

  PHISHTANK_API_KEY: optionalString,
  URLHAUS_AUTH_KEY: optionalString,
  GOOGLE_SAFE_BROWSING_API_KEY: optionalString,
  OPENPHISH_FEED_URL: z.string().url().default('https://openphish.com/feed.txt'),

  VERIFIER_TIMEOUT_MS: positiveInt(12_000),
  USER_RATE_LIMIT_N: positiveInt(5),
  USER_RATE_LIMIT_WINDOW: positiveInt(60),
  ALERT_DEDUP_WINDOW_H: positiveInt(24),
  BROADCAST_BATCH_SIZE: positiveInt(25),
  BROADCAST_PAUSE_MS: z.coerce.number().int().nonnegative().default(300),
  USER_AGENT: z.string().default('linkwatch/0.1'),
});

export interface AppConfig {
  telegram: {
    botToken?: string;
    webhookSecret?: string;
    webhookUrl?: string;
    adminIds: Set<string>;
  };
  databaseUrl?: string;
  providers: {
    phishtankApiKey?: string;
    urlhausAuthKey?: string;
    safeBrowsingApiKey?: string;
    openphishFeedUrl: string;
  };
  verifierTimeoutMs: number;
  rateLimit: {
    maxSubmissions: number;
    windowMs: number;
  };
  dedupWindowMs: number;
  broadcast: {
    batchSize: number;
    pauseMs: number;
  };
  userAgent: string;
}

/**
 * Parse admin chat IDs; malformed entries are dropped with a warning
 */
export function parseAdminIds(raw: string | undefined): Set<string> {
  const ids = new Set<string>();
  if (!raw) return ids;

  for (const part of raw.split(',')) {
    const value = part.trim();
    if (!value) continue;
    if (/^-?\d+$/.test(value)) {
      ids.add(value);
    } else {
      log.warn('Ignoring invalid ADMIN_IDS entry', { entry: value });
    }
  }
  return ids;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.parse(env);

  return {
    telegram: {
      botToken: parsed.TELEGRAM_BOT_TOKEN,
      webhookSecret: parsed.TELEGRAM_WEBHOOK_SECRET,
      webhookUrl: parsed.WEBHOOK_URL,
      adminIds: parseAdminIds(parsed.ADMIN_IDS),
    },
    databaseUrl: parsed.DATABASE_URL,
    providers: {
      phishtankApiKey: parsed.PHISHTANK_API_KEY,
      urlhausAuthKey: parsed.URLHAUS_AUTH_KEY,
      safeBrowsingApiKey: parsed.GOOGLE_SAFE_BROWSING_API_KEY,
      openphishFeedUrl: parsed.OPENPHISH_FEED_URL,
    },
    verifierTimeoutMs: parsed.VERIFIER_TIMEOUT_MS,
    rateLimit: {
      maxSubmissions: parsed.USER_RATE_LIMIT_N,
      windowMs: parsed.USER_RATE_LIMIT_WINDOW * 1000,
    },
    dedupWindowMs: parsed.ALERT_DEDUP_WINDOW_H * 60 * 60 * 1000,
    broadcast: {
      batchSize: parsed.BROADCAST_BATCH_SIZE,
      pauseMs: parsed.BROADCAST_PAUSE_MS,
    },
    userAgent: parsed.USER_AGENT,
  };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Drop the cached configuration (tests)
 */
export function resetConfig(): void {
  _config = null;
}
