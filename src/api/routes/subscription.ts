/**
 * Subscription Routes
 * The caller's effective plan and the ceilings that come with it
 */

import { Hono } from 'hono';

import { limitFor } from '../../policy/plans.js';
import { LIMIT_KINDS } from '../../types/index.js';
import { successResponse } from '../utils/response.js';

/**
 * Create subscription routes. Expects the account middleware upstream.
 */
export function createSubscriptionRoutes(): Hono {
  const app = new Hono();

  /**
   * GET /subscription
   */
  app.get('/subscription', (c) => {
    const account = c.get('account');

    const limits = Object.fromEntries(
      LIMIT_KINDS.map((kind) => [kind, limitFor(account.plan, kind)])
    );

    return successResponse(
      c,
      {
        user_id: account.id,
        plan: account.plan,
        subscription_status: account.subscriptionStatus,
        subscription_expires_at:
          account.subscriptionExpiresAt?.toISOString() ?? null,
        first_upgrade_used: account.firstUpgradeUsed,
        lifetime_usage: account.lifetimeUsage,
        limits,
      },
      c.get('requestId')
    );
  });

  return app;
}
