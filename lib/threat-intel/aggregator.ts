/**
 * Verdict Aggregator
 *
 * Runs every configured verifier for one URL concurrently and keeps the
 * worst verdict. Verifier order is the tie-break: on equal severity the
 * verifier listed first wins.
 */

import { describeError } from '@/lib/errors';
import { generateCorrelationId, loggers, toError } from '@/lib/logging/logger';
import type { Verifier } from './providers/base-verifier';
import { NO_VERDICT, createResult, severity, type VerifierResult } from './types';

/**
 * Reduce per-provider results to one. An empty set, or one whose worst
 * verdict is `unknown`, yields `(unknown, "none", {})`.
 */
export function reduceResults(results: readonly VerifierResult[]): VerifierResult {
  let worst: VerifierResult | null = null;

  for (const result of results) {
    if (!worst || severity(result.verdict) > severity(worst.verdict)) {
      worst = result;
    }
  }

  if (!worst || worst.verdict === 'unknown') {
    return NO_VERDICT;
  }
  return worst;
}

export class VerdictAggregator {
  private readonly verifiers: readonly Verifier[];
  private readonly log = loggers.aggregator;

  constructor(verifiers: readonly Verifier[]) {
    this.verifiers = verifiers;
  }

  get providerNames(): string[] {
    return this.verifiers.map((verifier) => verifier.name);
  }

  /**
   * One aggregation round: fan out, wait for all, reduce
   */
  async classify(url: string): Promise<VerifierResult> {
    const roundLog = this.log.withCorrelationId(generateCorrelationId());
    const start = Date.now();

    const settled = await Promise.allSettled(
      this.verifiers.map(async (verifier) => verifier.verify(url))
    );

    const results = settled.map((outcome, index): VerifierResult => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const { name } = this.verifiers[index];
      roundLog.error('Verifier threw past its boundary', toError(outcome.reason), { provider: name });
      return createResult('unknown', name, describeError(outcome.reason));
    });

    const aggregate = reduceResults(results);

    roundLog.info('Aggregation round completed', {
      url,
      verdict: aggregate.verdict,
      source: aggregate.source,
      providers: results.map((result) => `${result.source}:${result.verdict}`),
      duration: Date.now() - start,
    });

    return aggregate;
  }
}
