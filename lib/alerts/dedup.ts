import type { AlertRecordStore } from '@/lib/reports/types';

export const DEFAULT_DEDUP_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * Suppresses repeat alerts for the same normalized URL inside a trailing window.
 * Check and record are separate calls; the caller records only after a
 * broadcast reached somebody.
 */
export class AlertDeduplicator {
  constructor(
    private readonly store: AlertRecordStore,
    private readonly windowMs: number = DEFAULT_DEDUP_WINDOW_MS
  ) {}

  async shouldAlert(url: string, now: Date = new Date()): Promise<boolean> {
    const since = new Date(now.getTime() - this.windowMs);
    return !(await this.store.hasAlertSince(url, since));
  }

  async record(url: string, time: Date = new Date()): Promise<void> {
    await this.store.appendAlert(url, time);
  }
}
