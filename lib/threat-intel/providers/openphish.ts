/**
 * OpenPhish community feed
 * https://openphish.com/
 *
 * OpenPhish has no per-URL lookup endpoint, only a plain-text feed with one
 * URL per line. The adapter keeps the latest snapshot of that feed and
 * answers lookups from it.
 */

import { ProviderUnavailableError, describeError } from '@/lib/errors';
import { normalizeCandidate } from '@/lib/links/normalizer';
import type { HttpClient } from '../http-client';
import type { VerifierResult } from '../types';
import { BaseVerifier } from './base-verifier';

export const OPENPHISH_FEED_URL = 'https://openphish.com/feed.txt';

// The community feed is regenerated every 12 hours
export const OPENPHISH_REFRESH_INTERVAL_MS = 12 * 60 * 60 * 1000;

export interface FeedSnapshot {
  urls: ReadonlySet<string>;
  fetchedAt: Date;
}

/**
 * Parse feed text into normalized URLs
 */
export function parseOpenPhishFeed(text: string, fetchedAt: Date = new Date()): FeedSnapshot {
  const urls = new Set<string>();

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('http')) continue;

    const url = normalizeCandidate(trimmed);
    if (url) urls.add(url);
  }

  return { urls, fetchedAt };
}

export interface OpenPhishConfig {
  feedUrl?: string;
  refreshIntervalMs?: number;
}

export class OpenPhishVerifier extends BaseVerifier {
  readonly name = 'OpenPhish';
  private readonly feedUrl: string;
  private readonly refreshIntervalMs: number;
  private snapshot: FeedSnapshot | null = null;
  private inflight: Promise<FeedSnapshot> | null = null;

  constructor(http: HttpClient, config: OpenPhishConfig = {}) {
    super(http);
    this.feedUrl = config.feedUrl ?? OPENPHISH_FEED_URL;
    this.refreshIntervalMs = config.refreshIntervalMs ?? OPENPHISH_REFRESH_INTERVAL_MS;
  }

  protected async lookup(url: string): Promise<VerifierResult> {
    const { snapshot, stale } = await this.currentSnapshot();
    const meta = {
      feedSize: snapshot.urls.size,
      fetchedAt: snapshot.fetchedAt.toISOString(),
      ...(stale ? { stale: true } : {}),
    };

    // Exact entries only
    if (snapshot.urls.has(url)) {
      return this.result('phish', { ...meta, match: 'url' });
    }
    return this.result('clean', meta);
  }

  /**
   * Fresh snapshot, refreshing when expired. A failed refresh falls back to
   * the previous snapshot when there is one.
   */
  private async currentSnapshot(): Promise<{ snapshot: FeedSnapshot; stale: boolean }> {
    const current = this.snapshot;
    if (current && Date.now() - current.fetchedAt.getTime() < this.refreshIntervalMs) {
      return { snapshot: current, stale: false };
    }

    try {
      return { snapshot: await this.refresh(), stale: false };
    } catch (error) {
      if (!current) throw error;
      this.log.warn('OpenPhish refresh failed, serving previous snapshot', {
        provider: this.name,
        ...describeError(error),
      });
      return { snapshot: current, stale: true };
    }
  }

  /**
   * Concurrent lookups share one download
   */
  refresh(): Promise<FeedSnapshot> {
    if (!this.inflight) {
      this.inflight = this.download().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async download(): Promise<FeedSnapshot> {
    const text = await this.http.getText(this.feedUrl);
    const snapshot = parseOpenPhishFeed(text);

    if (snapshot.urls.size === 0) {
      throw new ProviderUnavailableError(this.name, 'OpenPhish feed is empty');
    }

    this.snapshot = snapshot;
    this.log.info('OpenPhish feed refreshed', { provider: this.name, count: snapshot.urls.size });
    return snapshot;
  }

  getSnapshotStats(): { count: number; fetchedAt: Date | null } {
    return {
      count: this.snapshot?.urls.size ?? 0,
      fetchedAt: this.snapshot?.fetchedAt ?? null,
    };
  }
}
