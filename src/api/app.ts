/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { isInfrastructureUnavailable } from '../lib/errors.js';
import type { TokenVerifier } from '../lib/supabase.js';
import { getGuardrails } from '../policy/plans.js';
import type { AccountService } from '../services/account.service.js';
import type { AuditService } from '../services/audit.service.js';
import type { EmailScanGuard } from '../services/email-scan-guard.service.js';
import type { QuotaService } from '../services/quota.service.js';
import type { RateLimitPrimitives } from '../services/rate-limit.service.js';
import type { SubscriptionEventService } from '../services/subscription-event.service.js';

import { createAccountMiddleware } from './middleware/account.js';
import {
  createAuthMiddleware,
  createRequestContextMiddleware,
} from './middleware/auth.js';
import { createFeatureGate } from './middleware/feature-gate.js';
import {
  createRateLimitMiddleware,
  IP_THROTTLE_NAMESPACE,
} from './middleware/rateLimit.js';
import { createEntitlementRoutes } from './routes/entitlements.js';
import { createGuardrailRoutes } from './routes/guardrails.js';
import { createHealthRoutes } from './routes/health.js';
import { createQuotaRoutes } from './routes/quota.js';
import { createSubscriptionRoutes } from './routes/subscription.js';
import { createWebhookRoutes } from './routes/webhooks.js';
import { unavailableResponse } from './utils/response.js';

/**
 * Services the HTTP layer delegates to
 */
export interface ApiServices {
  accountService: AccountService;
  auditService: AuditService;
  quotaService: QuotaService;
  subscriptionEventService: SubscriptionEventService;
  emailScanGuard: EmailScanGuard;
}

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  tokenVerifier: TokenVerifier;
  limiter: RateLimitPrimitives;
  allowedOrigins?: string[];
  trustProxyHeaders?: boolean;
  clock?: () => Date;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, tokenVerifier, limiter, allowedOrigins, clock } = config;
  const app = new Hono();
  const guardrails = getGuardrails();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );
  app.use(
    '*',
    createRequestContextMiddleware({
      trustProxyHeaders: config.trustProxyHeaders ?? true,
    })
  );

  // Public routes (no auth)
  app.route('/api/v1', createHealthRoutes(clock !== undefined ? { clock } : {}));
  app.route(
    '/',
    createWebhookRoutes({
      subscriptionEventService: services.subscriptionEventService,
    })
  );

  // Per-IP throttle runs before auth so invalid tokens are throttled too
  const ipThrottle = createRateLimitMiddleware(limiter, {
    namespace: IP_THROTTLE_NAMESPACE,
    limit: guardrails.IP_RATE_LIMIT,
    window: guardrails.IP_RATE_WINDOW_SECONDS,
  });
  app.use('/api/v1/quota/*', ipThrottle);

  // Protected routes: auth, then account with lazy downgrade
  const authMiddleware = createAuthMiddleware({ tokenVerifier });
  const accountMiddleware = createAccountMiddleware({
    accountService: services.accountService,
  });
  for (const path of [
    '/api/v1/subscription',
    '/api/v1/quota/*',
    '/api/v1/guardrails/*',
    '/api/v1/entitlements/*',
  ]) {
    app.use(path, authMiddleware);
    app.use(path, accountMiddleware);
  }

  const requireFeature = createFeatureGate({
    auditService: services.auditService,
    ...(clock !== undefined && { clock }),
  });

  app.route('/api/v1', createSubscriptionRoutes());
  app.route(
    '/api/v1',
    createQuotaRoutes({ quotaService: services.quotaService })
  );
  app.route(
    '/api/v1',
    createGuardrailRoutes({ emailScanGuard: services.emailScanGuard })
  );
  app.route('/api/v1', createEntitlementRoutes({ requireFeature }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId'),
        },
      },
      404
    );
  });

  // Global error handler: infrastructure failures fail closed with 503
  app.onError((err, c) => {
    const requestId = c.get('requestId');

    if (isInfrastructureUnavailable(err)) {
      console.error(`${err.component} unavailable:`, err.cause ?? err);
      return unavailableResponse(c, err, requestId);
    }

    console.error('Unhandled error:', err);
    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
