/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { InfrastructureUnavailableError } from '../../lib/errors.js';
import { getErrorStatus } from '../types.js';

/**
 * Seconds a client should wait after a 503 from a degraded dependency
 */
export const UNAVAILABLE_RETRY_AFTER_SECONDS = 5;

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  const retryAfter = error.details?.['retryAfter'];
  if (typeof retryAfter === 'number') {
    c.header('Retry-After', String(retryAfter));
  }

  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        ...(error.details !== undefined && { details: error.details }),
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Denials that carry upgrade guidance put their payload directly on the
 * error object: `{error:{code, message, plan, limit_type, ..., upgrade}}`.
 */
export function upgradeErrorResponse(
  c: Context,
  error: ServiceError,
  requestId: string,
  retryAfterSeconds?: number
): Response {
  if (retryAfterSeconds !== undefined) {
    c.header('Retry-After', String(retryAfterSeconds));
  }
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        ...error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * 503 for an unreachable counter store or database
 */
export function unavailableResponse(
  c: Context,
  err: InfrastructureUnavailableError,
  requestId: string
): Response {
  c.header('Retry-After', String(UNAVAILABLE_RETRY_AFTER_SECONDS));
  return c.json(
    {
      error: {
        code:
          err.component === 'counter_store'
            ? 'RATE_LIMITER_UNAVAILABLE'
            : 'SERVICE_UNAVAILABLE',
        message: err.message,
        requestId,
      },
    },
    503
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}
