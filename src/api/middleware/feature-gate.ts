/**
 * Feature Gate Middleware
 * 403 UPGRADE_REQUIRED when the caller's effective plan lacks a feature
 */

import type { Context, Next } from 'hono';

import { hasFeature } from '../../policy/plans.js';
import type { Feature } from '../../policy/plans.js';
import { buildUpgradeGuidance } from '../../policy/upgrade.js';
import type { AuditService } from '../../services/audit.service.js';
import { failure } from '../../types/index.js';
import { errorResponse, upgradeErrorResponse } from '../utils/response.js';

/**
 * A fixed feature, or one read from the request (null = unknown feature)
 */
export type FeatureSelector = Feature | ((c: Context) => Feature | null);

export function createFeatureGate(deps: {
  auditService: AuditService;
  clock?: () => Date;
}) {
  const { auditService } = deps;
  const clock = deps.clock ?? (() => new Date());

  return function requireFeature(selector: FeatureSelector) {
    return async function featureGateMiddleware(c: Context, next: Next) {
      const requestId = c.get('requestId');
      const feature = typeof selector === 'function' ? selector(c) : selector;

      if (feature === null) {
        return errorResponse(
          c,
          failure('VALIDATION_ERROR', 'Unknown feature').error,
          requestId
        );
      }

      const account = c.get('account');
      if (hasFeature(account.plan, feature)) {
        await next();
        return;
      }

      const upgrade = buildUpgradeGuidance(account, feature, clock());

      await auditService.log(c.get('actor'), {
        action: 'UPGRADE_REQUIRED',
        resourceType: 'user',
        resourceId: account.id,
        details: {
          feature,
          current_plan: account.plan,
          recommended_plan: upgrade.recommended_plan,
          endpoint: c.req.path,
        },
      });

      return upgradeErrorResponse(
        c,
        failure('UPGRADE_REQUIRED', 'Upgrade required to access this feature', {
          reason: 'feature_not_in_plan',
          feature,
          current_plan: account.plan,
          ...upgrade,
        }).error,
        requestId
      );
    };
  };
}
