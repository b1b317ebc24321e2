/**
 * Google Safe Browsing Lookup API (v4)
 * https://developers.google.com/safe-browsing/v4/lookup-api
 */

import { z } from 'zod';
import { ProviderUnavailableError } from '@/lib/errors';
import type { HttpClient } from '../http-client';
import type { VerifierResult } from '../types';
import { BaseVerifier } from './base-verifier';

export const SAFE_BROWSING_FIND_URL = 'https://safebrowsing.googleapis.com/v4/threatMatches:find';

export const THREAT_TYPES = [
  'MALWARE',
  'SOCIAL_ENGINEERING',
  'UNWANTED_SOFTWARE',
  'POTENTIALLY_HARMFUL_APPLICATION',
] as const;

/** Matches of these types are confirmed-malicious; the rest are suspicious */
const CONFIRMED_THREAT_TYPES = new Set<string>(['MALWARE', 'SOCIAL_ENGINEERING']);

const threatMatchesSchema = z.object({
  matches: z
    .array(
      z
        .object({
          threatType: z.string(),
          platformType: z.string().optional(),
          threatEntryType: z.string().optional(),
          threat: z.object({ url: z.string() }).optional(),
          cacheDuration: z.string().optional(),
        })
        .passthrough()
    )
    .optional(),
});

export type ThreatMatches = z.infer<typeof threatMatchesSchema>;

export interface SafeBrowsingConfig {
  apiKey?: string;
  endpoint?: string;
  clientId?: string;
  clientVersion?: string;
}

export class SafeBrowsingVerifier extends BaseVerifier {
  readonly name = 'SafeBrowsing';
  private readonly config: SafeBrowsingConfig;

  constructor(http: HttpClient, config: SafeBrowsingConfig = {}) {
    super(http);
    this.config = config;
  }

  protected async lookup(url: string): Promise<VerifierResult> {
    if (!this.config.apiKey) {
      return this.missingCredential('GOOGLE_SAFE_BROWSING_API_KEY');
    }

    const endpoint = `${this.config.endpoint ?? SAFE_BROWSING_FIND_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const body = await this.http.postJson(endpoint, {
      client: {
        clientId: this.config.clientId ?? 'linkwatch',
        clientVersion: this.config.clientVersion ?? '0.1.0',
      },
      threatInfo: {
        threatTypes: THREAT_TYPES,
        platformTypes: ['ANY_PLATFORM'],
        threatEntryTypes: ['URL'],
        threatEntries: [{ url }],
      },
    });

    const parsed = threatMatchesSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(this.name, 'Malformed Safe Browsing response');
    }

    return this.mapMatches(parsed.data);
  }

  mapMatches(response: ThreatMatches): VerifierResult {
    const matches = response.matches ?? [];
    if (matches.length === 0) {
      return this.result('clean', { matches: 0 });
    }

    const threatTypes = [...new Set(matches.map((match) => match.threatType))];
    const confirmed = threatTypes.some((type) => CONFIRMED_THREAT_TYPES.has(type));

    return this.result(confirmed ? 'phish' : 'suspicious', {
      matches: matches.length,
      threatTypes,
    });
  }
}
