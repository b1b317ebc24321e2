/**
 * Bot reply templates (Telegram HTML parse mode)
 */

import type { Report } from '@/lib/reports/types';
import type { Verdict } from '@/lib/threat-intel/types';

export function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export const WELCOME = [
  '👋 Welcome to <b>linkwatch</b>, a community anti-phishing bot.',
  '',
  '• Send any suspicious <b>link</b> or use <code>/report &lt;url&gt;</code>.',
  '• Community alerts: <code>/subscribe</code>. To stop them: <code>/unsubscribe</code>.',
  '• Check without alerting anyone: <code>/check &lt;url&gt;</code>.',
  '• Latest reports: <code>/recent</code>.',
  '',
  'Privacy: we store the URL, its domain and minimal metadata for investigation.',
].join('\n');

export const SUBSCRIBED = '✅ Subscription active. You will receive phishing alerts in real time.';
export const UNSUBSCRIBED = '🛑 Subscription cancelled. Come back any time with /subscribe.';
export const NO_URLS = '⚠️ No valid URLs found in your message.';
export const NO_REPORTS = 'No reports yet.';
export const REPORT_USAGE = 'Usage: /report <url>';
export const CHECK_USAGE = 'Usage: /check <url>';

export function rateLimited(retryAfterSeconds: number): string {
  return `⏳ Too many reports. Try again in ${retryAfterSeconds} s.`;
}

export function alertText(url: string, source: string): string {
  return `⚠️ <b>Active phishing</b> detected\n${escapeHtml(url)}\nSource: <i>${escapeHtml(source)}</i>`;
}

export function checkResult(url: string, verdict: Verdict, source: string): string {
  const label = verdict === 'suspicious' || verdict === 'phish' ? `<b>${verdict.toUpperCase()}</b>` : verdict;
  return `${escapeHtml(url)}\nResult: ${label} (source: ${escapeHtml(source)})`;
}

export function reportAcknowledged(count: number, alerted: number): string {
  const noun = count === 1 ? 'link' : 'links';
  if (alerted === 0) {
    return `🙏 Thanks, ${count} ${noun} checked.`;
  }
  return `🙏 Thanks, ${count} ${noun} checked. Subscribers alerted about ${alerted}.`;
}

export function recentReports(reports: readonly Report[]): string {
  if (reports.length === 0) return NO_REPORTS;
  return reports
    .map(
      (report, i) =>
        `${i + 1}. [${report.verdict}] ${escapeHtml(report.url)} · ${escapeHtml(report.source)} · ${report.createdAt.toISOString()}`
    )
    .join('\n');
}

export function healthSummary(subscribers: number, reports: number, now: Date): string {
  return `OK · subscribers: ${subscribers}, reports: ${reports}, tz: UTC, now: ${now.toISOString()}`;
}
