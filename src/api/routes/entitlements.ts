/**
 * Entitlement Routes
 * Lets clients ask whether the current plan unlocks a feature
 */

import type { Context, MiddlewareHandler } from 'hono';
import { Hono } from 'hono';

import { isFeature } from '../../policy/plans.js';
import type { Feature } from '../../policy/plans.js';
import type { FeatureSelector } from '../middleware/feature-gate.js';
import { successResponse } from '../utils/response.js';

interface EntitlementRoutesDeps {
  requireFeature: (selector: FeatureSelector) => MiddlewareHandler;
}

function featureFromPath(c: Context): Feature | null {
  const feature = c.req.param('feature')?.toUpperCase() ?? '';
  return isFeature(feature) ? feature : null;
}

/**
 * Create entitlement routes. Expects the account middleware upstream.
 */
export function createEntitlementRoutes(deps: EntitlementRoutesDeps): Hono {
  const app = new Hono();

  /**
   * GET /entitlements/:feature
   * 200 when included in the plan, 403 UPGRADE_REQUIRED otherwise
   */
  app.get(
    '/entitlements/:feature',
    deps.requireFeature(featureFromPath),
    (c) => {
      return successResponse(
        c,
        {
          feature: featureFromPath(c),
          allowed: true,
          plan: c.get('account').plan,
        },
        c.get('requestId')
      );
    }
  );

  return app;
}
