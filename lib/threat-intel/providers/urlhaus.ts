/**
 * URLhaus URL lookup
 * https://urlhaus-api.abuse.ch/#urlinfo
 */

import { z } from 'zod';
import { ProviderUnavailableError } from '@/lib/errors';
import type { HttpClient } from '../http-client';
import type { VerifierResult } from '../types';
import { BaseVerifier } from './base-verifier';

export const URLHAUS_LOOKUP_URL = 'https://urlhaus-api.abuse.ch/v1/url/';

const urlhausResponseSchema = z
  .object({
    query_status: z.string(),
    id: z.union([z.string(), z.number()]).optional(),
    url_status: z.string().optional(),
    threat: z.string().nullable().optional(),
    date_added: z.string().nullable().optional(),
    urlhaus_reference: z.string().optional(),
    tags: z.array(z.string()).nullable().optional(),
  })
  .passthrough();

export type URLhausResponse = z.infer<typeof urlhausResponseSchema>;

export interface URLhausConfig {
  authKey?: string;
  endpoint?: string;
}

export class URLhausVerifier extends BaseVerifier {
  readonly name = 'URLhaus';
  private readonly authKey?: string;
  private readonly endpoint: string;

  constructor(http: HttpClient, config: URLhausConfig = {}) {
    super(http);
    this.authKey = config.authKey;
    this.endpoint = config.endpoint ?? URLHAUS_LOOKUP_URL;
  }

  protected async lookup(url: string): Promise<VerifierResult> {
    const body = await this.http.postForm(
      this.endpoint,
      { url },
      this.authKey ? { headers: { 'Auth-Key': this.authKey } } : {}
    );

    const parsed = urlhausResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(this.name, 'Malformed URLhaus response');
    }

    return this.mapResponse(parsed.data);
  }

  /**
   * Listed and online -> phish; listed but offline or unknown -> suspicious
   */
  mapResponse(response: URLhausResponse): VerifierResult {
    switch (response.query_status) {
      case 'ok':
        return this.result(response.url_status === 'online' ? 'phish' : 'suspicious', response);
      case 'no_results':
        return this.result('clean', response);
      default:
        return this.result('unknown', response);
    }
  }
}
