/**
 * Webhook Routes
 * Billing provider callbacks. Public: authenticity is checked against the
 * shared secret, not a user token.
 */

import { Hono } from 'hono';

import type { SubscriptionEventService } from '../../services/subscription-event.service.js';
import type { WebhookProvider } from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

const PROVIDERS: readonly WebhookProvider[] = ['revenuecat'];
const PROVIDER_NAMES: readonly string[] = PROVIDERS;

function isWebhookProvider(value: string): value is WebhookProvider {
  return PROVIDER_NAMES.includes(value);
}

interface WebhookRoutesDeps {
  subscriptionEventService: Pick<SubscriptionEventService, 'processWebhook'>;
}

/**
 * Create webhook routes
 */
export function createWebhookRoutes(deps: WebhookRoutesDeps): Hono {
  const { subscriptionEventService } = deps;
  const app = new Hono();

  /**
   * POST /webhooks/:provider
   * 200 for applied, ignored and duplicate events. Database failures
   * reach the app error handler as 503 so the provider redelivers.
   */
  app.post('/webhooks/:provider', async (c) => {
    const requestId = c.get('requestId');
    const provider = c.req.param('provider');

    if (!isWebhookProvider(provider)) {
      return c.json(
        {
          error: {
            code: 'NOT_FOUND',
            message: `Unknown webhook provider: ${provider}`,
            requestId,
          },
        },
        404
      );
    }

    const rawBody = await c.req.text();
    const actor = { ...c.get('actor'), type: 'webhook' as const };

    const result = await subscriptionEventService.processWebhook(actor, {
      provider,
      rawBody,
      headers: {
        authorization: c.req.header('authorization'),
        signature:
          c.req.header('x-revenuecat-signature') ?? c.req.header('x-signature'),
      },
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return c.json(result.data, 200);
  });

  return app;
}
