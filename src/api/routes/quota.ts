/**
 * Quota Routes
 * Scan services call this before they call a paid external provider
 */

import { Hono } from 'hono';

import type { QuotaService } from '../../services/quota.service.js';
import { isLimitKind } from '../../types/index.js';
import {
  errorResponse,
  successResponse,
  upgradeErrorResponse,
} from '../utils/response.js';

interface QuotaRoutesDeps {
  quotaService: Pick<QuotaService, 'enforce' | 'cooldownSeconds'>;
}

/**
 * Create quota routes. Expects the account middleware upstream.
 */
export function createQuotaRoutes(deps: QuotaRoutesDeps): Hono {
  const { quotaService } = deps;
  const app = new Hono();

  /**
   * POST /quota/:limitKind
   * Consume one unit of the named limit
   */
  app.post('/quota/:limitKind', async (c) => {
    const requestId = c.get('requestId');
    const limitKind = c.req.param('limitKind').toUpperCase();

    if (!isLimitKind(limitKind)) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: `Unknown limit kind: ${limitKind}`,
        },
        requestId
      );
    }

    const result = await quotaService.enforce(
      c.get('actor'),
      c.get('account'),
      limitKind,
      c.req.path
    );

    if (!result.success) {
      // Denials hold a cooldown; retrying sooner is refused without a count
      const retryAfter =
        result.error.code === 'PLAN_LIMIT_EXCEEDED'
          ? quotaService.cooldownSeconds
          : undefined;
      return upgradeErrorResponse(c, result.error, requestId, retryAfter);
    }

    return successResponse(
      c,
      {
        allowed: true,
        limit_type: result.data.limit_type,
        limit: result.data.limit,
      },
      requestId
    );
  });

  return app;
}
