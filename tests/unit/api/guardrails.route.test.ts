/**
 * Guardrail Routes Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createGuardrailRoutes } from '@/api/routes/guardrails.js';
import { failure, success } from '@/types/index.js';

import {
  TEST_IP,
  TEST_REQUEST_ID,
  TEST_USER_ID,
  createTestAccount,
} from '../../fixtures/index.js';
import { withRequestContext } from '../../helpers/hono.js';

describe('Guardrail Routes', () => {
  let mockEmailScanGuard: { check: ReturnType<typeof vi.fn> };
  let app: Hono;

  beforeEach(() => {
    mockEmailScanGuard = {
      check: vi.fn().mockResolvedValue(success({ email: 'alice@example.com' })),
    };
    app = new Hono();
    app.use('*', withRequestContext({ account: createTestAccount() }));
    app.route('/api/v1', createGuardrailRoutes({ emailScanGuard: mockEmailScanGuard }));
  });

  function post(body: string): Promise<Response> {
    return Promise.resolve(
      app.request('/api/v1/guardrails/email-scan', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
      })
    );
  }

  describe('POST /guardrails/email-scan', () => {
    it('should allow a scan that passes every guardrail', async () => {
      const res = await post(JSON.stringify({ email: 'Alice@Example.com' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: { allowed: true },
        meta: { requestId: TEST_REQUEST_ID },
      });
      expect(mockEmailScanGuard.check).toHaveBeenCalledWith(
        TEST_USER_ID,
        TEST_IP,
        'Alice@Example.com'
      );
    });

    it('should reject a body without an address', async () => {
      const res = await post(JSON.stringify({}));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'email is required',
          requestId: TEST_REQUEST_ID,
        },
      });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await post('email=alice');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid JSON body' },
      });
    });

    it('should return 429 with Retry-After when a guardrail trips', async () => {
      mockEmailScanGuard.check.mockResolvedValue(
        failure('RATE_LIMITED', 'Too many e-mail scans', {
          reason: 'duplicate_scan',
          retryAfter: 120,
        })
      );

      const res = await post(JSON.stringify({ email: 'alice@example.com' }));

      expect(res.status).toBe(429);
      expect(res.headers.get('Retry-After')).toBe('120');
      expect(await res.json()).toEqual({
        error: {
          code: 'RATE_LIMITED',
          message: 'Too many e-mail scans',
          details: { reason: 'duplicate_scan', retryAfter: 120 },
          requestId: TEST_REQUEST_ID,
        },
      });
    });
  });
});
