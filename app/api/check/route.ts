/**
 * Link Check API
 * Classifies one URL without storing a report or alerting subscribers
 */

import { NextRequest, NextResponse } from 'next/server';
import { BadRequestError, ErrorCode, RateLimitedError, errorToResponse } from '@/lib/api/errors';
import { getRateLimitHeaders } from '@/lib/api/rate-limiter';
import { checkRequestSchema, validateBody } from '@/lib/api/schemas';
import { getAggregator, getSubmissionLimiter } from '@/lib/app/context';
import { normalizeCandidate } from '@/lib/links/normalizer';
import { loggers } from '@/lib/logging/logger';

const log = loggers.api;

export const dynamic = 'force-dynamic';

function clientKey(request: NextRequest): string {
  const forwarded = request.headers.get('x-forwarded-for');
  const ip = forwarded?.split(',')[0]?.trim() || request.headers.get('x-real-ip') || 'unknown';
  return `api:${ip}`;
}

export async function POST(request: NextRequest) {
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      throw new BadRequestError('Malformed JSON body');
    }

    const { url: raw } = validateBody(checkRequestSchema, body);
    const url = normalizeCandidate(raw);
    if (!url) {
      throw new BadRequestError('Invalid URL', [{ field: 'url', message: 'Not an absolute http(s) URL' }], ErrorCode.INVALID_URL);
    }

    const limit = getSubmissionLimiter().consume(clientKey(request));
    if (!limit.allowed) {
      throw new RateLimitedError(limit.retryAfter ?? 1);
    }

    const result = await getAggregator().classify(url);
    log.info('Link checked', { url, verdict: result.verdict, source: result.source });

    return NextResponse.json(
      {
        url,
        verdict: result.verdict,
        source: result.source,
        evidence: result.evidence,
      },
      { headers: getRateLimitHeaders(limit) }
    );
  } catch (error) {
    return errorToResponse(error);
  }
}
