/**
 * PhishTank URL check
 * https://phishtank.org/api_info.php
 *
 * PhishTank answers whether a URL is in its database and whether the
 * community has verified it as a live phish.
 */

import { z } from 'zod';
import { ProviderUnavailableError } from '@/lib/errors';
import type { HttpClient } from '../http-client';
import type { VerifierResult } from '../types';
import { BaseVerifier } from './base-verifier';

export const PHISHTANK_CHECK_URL = 'https://checkurl.phishtank.com/checkurl/';

const phishTankResponseSchema = z.object({
  results: z
    .object({
      url: z.string().optional(),
      in_database: z.boolean(),
      phish_id: z.union([z.string(), z.number()]).optional(),
      phish_detail_page: z.string().optional(),
      verified: z.boolean().optional(),
      verified_at: z.string().nullable().optional(),
      valid: z.boolean().optional(),
    })
    .passthrough(),
});

export type PhishTankResults = z.infer<typeof phishTankResponseSchema>['results'];

export interface PhishTankConfig {
  apiKey?: string;
  endpoint?: string;
}

export class PhishTankVerifier extends BaseVerifier {
  readonly name = 'PhishTank';
  private readonly apiKey?: string;
  private readonly endpoint: string;

  constructor(http: HttpClient, config: PhishTankConfig = {}) {
    super(http);
    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint ?? PHISHTANK_CHECK_URL;
  }

  protected async lookup(url: string): Promise<VerifierResult> {
    if (!this.apiKey) {
      return this.missingCredential('PHISHTANK_API_KEY');
    }

    const body = await this.http.postForm(this.endpoint, {
      format: 'json',
      app_key: this.apiKey,
      url,
    });

    const parsed = phishTankResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(this.name, 'Malformed PhishTank response', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.') || issue.message),
      });
    }

    return this.mapResults(parsed.data.results);
  }

  /**
   * in the database and valid -> phish; in the database otherwise -> suspicious
   */
  mapResults(results: PhishTankResults): VerifierResult {
    if (!results.in_database) {
      return this.result('clean', results);
    }
    if (results.valid === true) {
      return this.result('phish', results);
    }
    return this.result('suspicious', results);
  }
}
