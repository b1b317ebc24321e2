/**
 * Base class for reputation provider adapters
 *
 * Subclasses implement `lookup` and may throw freely; `verify` is the
 * boundary where every failure becomes `(unknown, <provider>, diagnostics)`.
 */

import { describeError } from '@/lib/errors';
import { loggers } from '@/lib/logging/logger';
import type { HttpClient } from '../http-client';
import { createResult, type Verdict, type VerifierResult } from '../types';

export interface Verifier {
  readonly name: string;
  verify(url: string): Promise<VerifierResult>;
}

export abstract class BaseVerifier implements Verifier {
  abstract readonly name: string;

  protected readonly http: HttpClient;
  protected readonly log = loggers.verifier;

  constructor(http: HttpClient) {
    this.http = http;
  }

  async verify(url: string): Promise<VerifierResult> {
    const start = Date.now();

    try {
      const result = await this.lookup(url);
      this.log.debug('Provider lookup completed', {
        provider: this.name,
        verdict: result.verdict,
        duration: Date.now() - start,
      });
      return result;
    } catch (error) {
      const diagnostics = describeError(error);
      this.log.warn('Provider unavailable, verdict downgraded to unknown', {
        provider: this.name,
        url,
        duration: Date.now() - start,
        ...diagnostics,
      });
      return this.result('unknown', diagnostics);
    }
  }

  /**
   * Single request to the provider, mapped to a verdict
   */
  protected abstract lookup(url: string): Promise<VerifierResult>;

  protected result(verdict: Verdict, evidence: Record<string, unknown> = {}): VerifierResult {
    return createResult(verdict, this.name, evidence);
  }

  /**
   * Result for a provider whose credential is absent
   */
  protected missingCredential(setting: string): VerifierResult {
    this.log.debug('Provider skipped, credential not configured', { provider: this.name, setting });
    return this.result('unknown', { reason: 'no_api_key' });
  }
}
