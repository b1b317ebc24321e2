/**
 * Sliding Window Rate Limiter
 *
 * Per-identifier window of accepted timestamps, held in process memory.
 * Rejected attempts are not recorded, so a submitter that keeps retrying
 * is let through as soon as its oldest accepted submission leaves the window.
 */

export interface RateLimitConfig {
  /** Maximum accepted requests in the window */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
}

export interface RateLimitResult {
  allowed: boolean;
  /** Requests still accepted in the current window */
  remaining: number;
  limit: number;
  /** Seconds until the next request would be accepted (only when rejected) */
  retryAfter?: number;
}

export interface RateLimiter {
  /** Accept or reject, recording the timestamp when accepted */
  allow(identifier: string): boolean;
  consume(identifier: string): RateLimitResult;
  retryAfter(identifier: string): number;
  reset(identifier: string): void;
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private windows: Map<string, number[]> = new Map();
  private readonly config: RateLimitConfig;

  constructor(config: RateLimitConfig) {
    this.config = config;
  }

  /**
   * Timestamps inside [now - windowMs, now]
   */
  private prune(identifier: string, now: number): number[] {
    const windowStart = now - this.config.windowMs;
    const timestamps = (this.windows.get(identifier) ?? []).filter((ts) => ts >= windowStart);
    this.windows.set(identifier, timestamps);
    return timestamps;
  }

  allow(identifier: string): boolean {
    return this.consume(identifier).allowed;
  }

  consume(identifier: string): RateLimitResult {
    const now = Date.now();
    const timestamps = this.prune(identifier, now);

    if (timestamps.length >= this.config.maxRequests) {
      return {
        allowed: false,
        remaining: 0,
        limit: this.config.maxRequests,
        retryAfter: this.secondsUntilFree(timestamps, now),
      };
    }

    timestamps.push(now);
    return {
      allowed: true,
      remaining: this.config.maxRequests - timestamps.length,
      limit: this.config.maxRequests,
    };
  }

  retryAfter(identifier: string): number {
    const now = Date.now();
    const timestamps = this.prune(identifier, now);
    if (timestamps.length < this.config.maxRequests) return 0;
    return this.secondsUntilFree(timestamps, now);
  }

  private secondsUntilFree(timestamps: number[], now: number): number {
    // The oldest entry is pruned once it is strictly older than now - windowMs
    const freeAt = timestamps[0] + this.config.windowMs + 1;
    return Math.max(1, Math.ceil((freeAt - now) / 1000));
  }

  reset(identifier: string): void {
    this.windows.delete(identifier);
  }

  /**
   * Drop identifiers with no timestamps left in the window
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;
    for (const identifier of [...this.windows.keys()]) {
      if (this.prune(identifier, now).length === 0) {
        this.windows.delete(identifier);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }
}

export function createRateLimiter(config: RateLimitConfig): SlidingWindowRateLimiter {
  return new SlidingWindowRateLimiter(config);
}

export function getRateLimitHeaders(result: RateLimitResult): Record<string, string> {
  const headers: Record<string, string> = {
    'X-RateLimit-Limit': String(result.limit),
    'X-RateLimit-Remaining': String(result.remaining),
  };

  if (result.retryAfter !== undefined) {
    headers['Retry-After'] = String(result.retryAfter);
  }

  return headers;
}
