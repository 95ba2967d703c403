/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type { Account, ActorContext } from '../types/index.js';

/**
 * Extended Hono context with actor and the freshly loaded account
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
    account: Account;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<string, ContentfulStatusCode> = {
  UNAUTHORIZED: 401,
  INVALID_SIGNATURE: 401,
  UPGRADE_REQUIRED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  MALFORMED_EVENT: 400,
  RATE_LIMITED: 429,
  PLAN_LIMIT_EXCEEDED: 429,
  INTERNAL_ERROR: 500,
  RATE_LIMITER_UNAVAILABLE: 503,
  SERVICE_UNAVAILABLE: 503,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code] ?? 500;
}
