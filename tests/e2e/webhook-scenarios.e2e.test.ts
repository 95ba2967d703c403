/**
 * Subscription Webhook E2E Tests
 *
 * Flow: provider callback → signature check → ledger + account update
 *       redelivery and concurrent delivery → applied once
 *       upgrade via webhook → quota lifted
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  TEST_SECRET,
  TEST_USER_ID,
  createRevenueCatPayload,
  createTestAccount,
  signBody,
} from '../fixtures/index.js';
import { createE2EContext, type E2EContext } from '../helpers/e2e-utils.js';

describe('E2E: Subscription Webhooks', () => {
  let ctx: E2EContext;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    ctx = createE2EContext([createTestAccount()]);
  });

  async function deliver(
    event: Record<string, unknown>,
    headers: Record<string, string> = { Authorization: `Bearer ${TEST_SECRET}` }
  ): Promise<Response> {
    return ctx.app.request('/webhooks/revenuecat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(createRevenueCatPayload(event)),
    });
  }

  it('should acknowledge both concurrent deliveries and apply the event once', async () => {
    const [first, second] = await Promise.all([
      deliver({ id: 'evt_123' }),
      deliver({ id: 'evt_123' }),
    ]);

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);

    const bodies = [await first.json(), await second.json()];
    expect(bodies).toContainEqual({
      status: 'ok',
      idempotent: false,
      event_id: 'evt_123',
      processing_status: 'APPLIED',
      user_id: TEST_USER_ID,
      plan: 'PRO',
      subscription_status: 'ACTIVE',
      subscription_expires_at: '2025-04-12T09:00:00.000Z',
    });
    expect(bodies).toContainEqual({
      status: 'ok',
      idempotent: true,
      event_id: 'evt_123',
      processing_status: 'DUPLICATE',
    });

    expect(ctx.database.ledger.size).toBe(1);
    expect(
      ctx.auditLog.filter((entry) => entry.action === 'SUBSCRIPTION_UPDATED')
    ).toHaveLength(1);
  });

  it('should acknowledge a later redelivery without changing the account', async () => {
    await deliver({ id: 'evt_123' });
    ctx.clock.advance(3_600_000);

    const res = await deliver({ id: 'evt_123' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      idempotent: true,
      event_id: 'evt_123',
      processing_status: 'DUPLICATE',
    });
    expect(ctx.database.stats.transactions).toBe(1);
  });

  it('should not let a late cancellation undo a newer renewal', async () => {
    await deliver({
      id: 'evt_renewal',
      type: 'RENEWAL',
      event_timestamp_ms: Date.parse('2025-03-12T09:40:00.000Z'),
    });

    const res = await deliver({
      id: 'evt_cancel',
      type: 'CANCELLATION',
      event_timestamp_ms: Date.parse('2025-03-12T09:20:00.000Z'),
    });

    expect(await res.json()).toMatchObject({
      processing_status: 'IGNORED_OUT_OF_ORDER',
      plan: 'PRO',
      subscription_status: 'ACTIVE',
    });
    expect(ctx.database.ledger.get('evt_cancel')?.processingStatus).toBe(
      'IGNORED_OUT_OF_ORDER'
    );
  });

  it('should accept an HMAC signature header', async () => {
    const rawBody = JSON.stringify(createRevenueCatPayload());

    const res = await ctx.app.request('/webhooks/revenuecat', {
      method: 'POST',
      headers: { 'X-RevenueCat-Signature': signBody(rawBody) },
      body: rawBody,
    });

    expect(res.status).toBe(200);
  });

  it('should reject an unsigned callback with 401', async () => {
    const res = await deliver({}, {});

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_SIGNATURE' } });
    expect(ctx.database.ledger.size).toBe(0);
    expect(ctx.auditLog).toHaveLength(0);
  });

  it('should reject an active paid event without expiry with 400', async () => {
    const res = await deliver({ expiration_at_ms: undefined });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        code: 'MALFORMED_EVENT',
        message: 'Paid-plan events require expiration timestamp',
      },
    });
  });

  it('should return 503 so the provider retries when the database is down', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    ctx.database.unavailable = true;

    const res = await deliver({});

    expect(res.status).toBe(503);
    expect(res.headers.get('Retry-After')).toBe('5');
  });

  it('should lift free limits once an upgrade is applied', async () => {
    const consume = () =>
      ctx.app.request('/api/v1/quota/THREAT_DAILY', {
        method: 'POST',
        headers: ctx.authHeaders(TEST_USER_ID),
      });
    for (let i = 0; i < 3; i++) {
      await consume();
    }
    expect((await consume()).status).toBe(429);

    await deliver({});
    ctx.clock.advance(61_000);
    const res = await consume();

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { allowed: true, limit_type: 'THREAT_DAILY', limit: null },
    });
  });
});
