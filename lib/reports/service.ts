/**
 * Report Service
 *
 * One submission: rate-limit the submitter, classify each URL, persist a
 * report per URL and alert subscribers about new dangerous links.
 */

import type { AlertDeduplicator } from '@/lib/alerts/dedup';
import type { RateLimiter } from '@/lib/api/rate-limiter';
import { alertText } from '@/lib/bot/messages';
import { extractDomain } from '@/lib/links/normalizer';
import { generateCorrelationId, loggers } from '@/lib/logging/logger';
import type { BroadcastResult } from '@/lib/notifications/broadcast';
import { isAlertable, type Verdict, type VerifierResult } from '@/lib/threat-intel/types';
import type { ReportStore } from './types';

export interface Classifier {
  classify(url: string): Promise<VerifierResult>;
}

export interface AlertSender {
  broadcast(reportId: string, text: string): Promise<BroadcastResult>;
}

export interface Submission {
  submitterId: string;
  /** Already normalized */
  urls: readonly string[];
  /** Classify and store without alerting subscribers */
  silent: boolean;
}

export interface CheckedUrl {
  url: string;
  verdict: Verdict;
  source: string;
  reportId: string;
  alerted: boolean;
}

export type SubmissionOutcome =
  | { kind: 'no_urls' }
  | { kind: 'rate_limited'; retryAfterSeconds: number }
  | { kind: 'checked'; results: CheckedUrl[] };

export interface ReportServiceDeps {
  classifier: Classifier;
  reports: ReportStore;
  rateLimiter: RateLimiter;
  dedup: AlertDeduplicator;
  broadcaster: AlertSender;
  now?: () => Date;
}

export class ReportService {
  private readonly log = loggers.reports;
  private readonly now: () => Date;

  constructor(private readonly deps: ReportServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async submit(submission: Submission): Promise<SubmissionOutcome> {
    const { submitterId, urls, silent } = submission;

    if (urls.length === 0) {
      return { kind: 'no_urls' };
    }

    if (!this.deps.rateLimiter.allow(submitterId)) {
      const retryAfterSeconds = this.deps.rateLimiter.retryAfter(submitterId);
      this.log.withSubmitter(submitterId).info('Submission rate limited', { retryAfterSeconds });
      return { kind: 'rate_limited', retryAfterSeconds };
    }

    const submissionLog = this.log.withSubmitter(submitterId).withCorrelationId(generateCorrelationId());
    const results: CheckedUrl[] = [];

    for (const url of urls) {
      const result = await this.deps.classifier.classify(url);
      const reportId = await this.deps.reports.saveReport({
        submitterId,
        url,
        domain: extractDomain(url) ?? '',
        verdict: result.verdict,
        source: result.source,
        evidence: result.evidence,
        createdAt: this.now(),
      });

      let alerted = false;
      if (isAlertable(result.verdict) && !silent && (await this.deps.dedup.shouldAlert(url, this.now()))) {
        const delivery = await this.deps.broadcaster.broadcast(reportId, alertText(url, result.source));
        if (delivery.sent > 0) {
          await this.deps.dedup.record(url, this.now());
          alerted = true;
        }
      }

      submissionLog.info('Report stored', {
        reportId,
        url,
        verdict: result.verdict,
        source: result.source,
        silent,
        alerted,
      });

      results.push({ url, verdict: result.verdict, source: result.source, reportId, alerted });
    }

    return { kind: 'checked', results };
  }
}
