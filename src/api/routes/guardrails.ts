/**
 * Guardrail Routes
 * Abuse checks that run before an e-mail breach lookup
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { EmailScanGuard } from '../../services/email-scan-guard.service.js';
import { errorResponse, successResponse } from '../utils/response.js';

const emailScanSchema = z.object({
  email: z.string().min(1),
});

interface GuardrailRoutesDeps {
  emailScanGuard: Pick<EmailScanGuard, 'check'>;
}

/**
 * Create guardrail routes. Expects the account middleware upstream.
 */
export function createGuardrailRoutes(deps: GuardrailRoutesDeps): Hono {
  const { emailScanGuard } = deps;
  const app = new Hono();

  /**
   * POST /guardrails/email-scan
   */
  app.post('/guardrails/email-scan', async (c) => {
    const requestId = c.get('requestId');
    const actor = c.get('actor');

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Invalid JSON body' },
        requestId
      );
    }

    const parsed = emailScanSchema.safeParse(body);
    if (!parsed.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'email is required',
        },
        requestId
      );
    }

    const result = await emailScanGuard.check(
      c.get('account').id,
      actor.ip ?? 'unknown',
      parsed.data.email
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { allowed: true }, requestId);
  });

  return app;
}
