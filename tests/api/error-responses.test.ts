/**
 * Error Response Tests
 * Problem details returned by the HTTP endpoints
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';

import {
  ApiError,
  BadRequestError,
  ErrorCode,
  InternalError,
  RateLimitedError,
  UnauthorizedError,
  createErrorResponse,
  errorToResponse,
  isApiError,
} from '@/lib/api/errors';

describe('Error Responses', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('ApiError', () => {
    it('should serialize to problem details with extra fields', () => {
      const error = new BadRequestError(
        'Validation failed',
        [{ field: 'url', message: 'URL is required' }],
        ErrorCode.VALIDATION_ERROR
      );

      expect(error).toBeInstanceOf(ApiError);
      expect(error.toJSON()).toEqual({
        type: 'about:blank',
        title: 'Validation failed',
        status: 400,
        detail: 'Validation failed',
        code: 'VALIDATION_ERROR',
        fields: [{ field: 'url', message: 'URL is required' }],
      });
    });

    it('should recognize api errors only', () => {
      expect(isApiError(new UnauthorizedError())).toBe(true);
      expect(isApiError(new Error('plain'))).toBe(false);
    });
  });

  describe('createErrorResponse', () => {
    it('should set Retry-After for rate limited errors', async () => {
      const response = createErrorResponse(new RateLimitedError(7));

      expect(response.status).toBe(429);
      expect(response.headers.get('Retry-After')).toBe('7');
      expect(response.headers.get('Content-Type')).toBe('application/problem+json');
      expect(await response.json()).toMatchObject({ code: 'RATE_LIMITED', retryAfter: 7 });
    });

    it('should omit Retry-After for other errors', () => {
      const response = createErrorResponse(new UnauthorizedError('Invalid webhook secret'));

      expect(response.status).toBe(401);
      expect(response.headers.get('Retry-After')).toBeNull();
    });
  });

  describe('errorToResponse', () => {
    it('should map zod errors to validation failures', async () => {
      const parsed = z.object({ url: z.string() }).safeParse({});
      if (parsed.success) throw new Error('expected a validation failure');

      const response = errorToResponse(parsed.error);

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        code: 'VALIDATION_ERROR',
        fields: [{ field: 'url', message: 'Required' }],
      });
    });

    it('should map plain errors to 500', async () => {
      const response = errorToResponse(new Error('boom'));

      expect(response.status).toBe(500);
      expect(await response.json()).toMatchObject({ code: 'INTERNAL_ERROR', detail: 'boom' });
    });

    it('should map non-errors to 500', async () => {
      const response = errorToResponse('nope');

      expect(await response.json()).toMatchObject({ status: 500, detail: 'Unknown error' });
    });
  });

  describe('InternalError', () => {
    it('should hide the message in production', () => {
      vi.stubEnv('NODE_ENV', 'production');

      const error = new InternalError('database down');

      expect(error.message).toBe('An unexpected error occurred');
      expect(error.getInternalMessage()).toBe('database down');
    });
  });
});
