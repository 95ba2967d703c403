/**
 * Rate Limiting Middleware
 * Per-client sliding window in front of endpoints that cost money upstream
 */

import type { Context, Next } from 'hono';

import type { RateLimitPrimitives } from '../../services/rate-limit.service.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Key namespace in the counter store */
  namespace: string;

  /** Maximum requests allowed in the window */
  limit: number;

  /** Window duration in seconds */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to client IP)
   */
  getIdentifier?: (c: Context) => string;
}

export const IP_THROTTLE_NAMESPACE = 'ip-throttle';

function defaultGetIdentifier(c: Context): string {
  return c.get('actor').ip ?? 'unknown';
}

/**
 * Create rate limit middleware
 *
 * Counter store failures are not handled here; they reach the app error
 * handler and the request is refused with 503.
 */
export function createRateLimitMiddleware(
  limiter: Pick<RateLimitPrimitives, 'slidingWindowAllow'>,
  config: RateLimitConfig
) {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const allowed = await limiter.slidingWindowAllow(
      config.namespace,
      [getIdentifier(c)],
      config.window,
      config.limit
    );

    c.header('X-RateLimit-Limit', config.limit.toString());
    c.header('X-RateLimit-Window', config.window.toString());

    if (!allowed) {
      c.header('Retry-After', config.window.toString());
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: config.window,
              limit: config.limit,
            },
            requestId: c.get('requestId'),
          },
        },
        429
      );
    }

    await next();
  };
}
