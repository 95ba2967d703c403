/**
 * Auth Middleware
 * Request context for every request, and ActorContext from a Supabase JWT
 * on protected routes
 */

import { getConnInfo } from '@hono/node-server/conninfo';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { TokenVerifier } from '../../lib/supabase.js';
import type { ActorContext } from '../../types/index.js';

interface RequestContextOptions {
  /** Read the client address from X-Forwarded-For / X-Real-IP */
  trustProxyHeaders: boolean;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function socketAddress(c: Context): string | undefined {
  try {
    return getConnInfo(c).remote.address;
  } catch {
    // Not served by @hono/node-server (app.request in tests)
    return undefined;
  }
}

/**
 * Client address used for per-IP throttling
 */
export function resolveClientIp(c: Context, trustProxyHeaders: boolean): string {
  if (trustProxyHeaders) {
    const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
    if (forwarded !== undefined && forwarded !== '') {
      return forwarded;
    }
    const realIp = c.req.header('x-real-ip')?.trim();
    if (realIp !== undefined && realIp !== '') {
      return realIp;
    }
  }
  return socketAddress(c) ?? 'unknown';
}

/**
 * Runs on every route: assigns the request id and an anonymous actor
 */
export function createRequestContextMiddleware(options: RequestContextOptions) {
  return async function requestContextMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();
    const userAgent = c.req.header('user-agent');

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      ip: resolveClientIp(c, options.trustProxyHeaders),
      ...(userAgent !== undefined && { userAgent }),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);
    await next();
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts the bearer token, verifies it, upgrades the actor to a user
 */
export function createAuthMiddleware(deps: { tokenVerifier: TokenVerifier }) {
  const { tokenVerifier } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = c.get('requestId');

    const unauthorized = (message: string): Response =>
      c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message,
            requestId,
          },
        },
        401
      );

    const authHeader = c.req.header('Authorization');
    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized('Missing or invalid authorization header');
    }

    const token = authHeader.slice(7).trim();
    if (token === '') {
      return unauthorized('Missing or invalid authorization header');
    }

    const identity = await tokenVerifier.verify(token);
    if (identity === null) {
      return unauthorized('Invalid or expired token');
    }

    c.set('actor', {
      ...c.get('actor'),
      type: 'user',
      userId: identity.userId,
    });

    await next();
  };
}
