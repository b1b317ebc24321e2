/**
 * API Error Responses
 *
 * RFC 7807 Problem Details for the check and webhook endpoints.
 */

import { ZodError } from 'zod';

export const HttpStatus = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export const ErrorCode = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_URL: 'INVALID_URL',
  UNAUTHORIZED: 'UNAUTHORIZED',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface FieldError {
  field: string;
  message: string;
}

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  code: ErrorCodeValue;
  [key: string]: unknown;
}

export class ApiError extends Error {
  statusCode: number;
  code: ErrorCodeValue;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCodeValue,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }

  toJSON(): ProblemDetails {
    return {
      type: 'about:blank',
      title: this.message,
      status: this.statusCode,
      detail: this.message,
      code: this.code,
      ...this.details,
    };
  }
}

export class BadRequestError extends ApiError {
  constructor(message = 'Bad request', fields?: FieldError[], code: ErrorCodeValue = ErrorCode.BAD_REQUEST) {
    super(message, HttpStatus.BAD_REQUEST, code, fields ? { fields } : undefined);
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Authentication required') {
    super(message, HttpStatus.UNAUTHORIZED, ErrorCode.UNAUTHORIZED);
    this.name = 'UnauthorizedError';
  }
}

/**
 * 429: the submitter exceeded its sliding window
 */
export class RateLimitedError extends ApiError {
  retryAfter: number;

  constructor(retryAfter: number, message = 'Too many submissions') {
    super(message, HttpStatus.TOO_MANY_REQUESTS, ErrorCode.RATE_LIMITED, { retryAfter });
    this.name = 'RateLimitedError';
    this.retryAfter = retryAfter;
  }
}

/**
 * 500; hides the internal message in production
 */
export class InternalError extends ApiError {
  private internalMessage: string;

  constructor(message = 'An unexpected error occurred') {
    const publicMessage = process.env.NODE_ENV === 'production' ? 'An unexpected error occurred' : message;
    super(publicMessage, HttpStatus.INTERNAL_SERVER_ERROR, ErrorCode.INTERNAL_ERROR);
    this.name = 'InternalError';
    this.internalMessage = message;
  }

  getInternalMessage(): string {
    return this.internalMessage;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function createErrorResponse(error: ApiError): Response {
  const headers: Record<string, string> = {
    'Content-Type': 'application/problem+json',
  };
  if (error instanceof RateLimitedError) {
    headers['Retry-After'] = String(error.retryAfter);
  }

  return new Response(JSON.stringify(error.toJSON()), {
    status: error.statusCode,
    headers,
  });
}

/**
 * Convert any thrown value to a problem response
 */
export function errorToResponse(error: unknown): Response {
  if (isApiError(error)) {
    return createErrorResponse(error);
  }

  if (error instanceof ZodError) {
    const fields = error.errors.map((e) => ({
      field: e.path.join('.'),
      message: e.message,
    }));
    return createErrorResponse(new BadRequestError('Validation failed', fields, ErrorCode.VALIDATION_ERROR));
  }

  if (error instanceof Error) {
    return createErrorResponse(new InternalError(error.message));
  }

  return createErrorResponse(new InternalError('Unknown error'));
}
