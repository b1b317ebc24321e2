/**
 * Link reputation module
 * Provider adapters, the shared HTTP client and the aggregator
 */

import type { AppConfig } from '@/lib/config';
import { VerdictAggregator } from './aggregator';
import { FetchHttpClient, type HttpClient } from './http-client';
import type { Verifier } from './providers/base-verifier';
import { OpenPhishVerifier } from './providers/openphish';
import { PhishTankVerifier } from './providers/phishtank';
import { SafeBrowsingVerifier } from './providers/safe-browsing';
import { URLhausVerifier } from './providers/urlhaus';

export * from './types';
export { VerdictAggregator, reduceResults } from './aggregator';
export { FetchHttpClient, type HttpClient, type HttpRequestOptions } from './http-client';
export { BaseVerifier, type Verifier } from './providers/base-verifier';
export { PhishTankVerifier } from './providers/phishtank';
export { URLhausVerifier } from './providers/urlhaus';
export { OpenPhishVerifier, parseOpenPhishFeed } from './providers/openphish';
export { SafeBrowsingVerifier } from './providers/safe-browsing';

/**
 * Verifiers in tie-break order
 */
export function createVerifiers(config: AppConfig, http: HttpClient): Verifier[] {
  return [
    new PhishTankVerifier(http, { apiKey: config.providers.phishtankApiKey }),
    new URLhausVerifier(http, { authKey: config.providers.urlhausAuthKey }),
    new OpenPhishVerifier(http, { feedUrl: config.providers.openphishFeedUrl }),
    new SafeBrowsingVerifier(http, { apiKey: config.providers.safeBrowsingApiKey }),
  ];
}

export function createAggregator(config: AppConfig, http?: HttpClient): VerdictAggregator {
  const client =
    http ?? new FetchHttpClient({ timeoutMs: config.verifierTimeoutMs, userAgent: config.userAgent });
  return new VerdictAggregator(createVerifiers(config, client));
}
