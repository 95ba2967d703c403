/**
 * SubscriptionEventService Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { InfrastructureUnavailableError } from '@/lib/errors.js';
import {
  createSubscriptionEventService,
  isOutOfOrder,
  type SubscriptionEventService,
} from '@/services/subscription-event.service.js';
import type { ActorContext } from '@/types/index.js';

import {
  OTHER_USER_ID,
  TEST_NOW,
  TEST_SECRET,
  TEST_USER_ID,
  createRevenueCatPayload,
  createTestAccount,
  createTestClock,
  signBody,
} from '../../fixtures/index.js';
import {
  createMemoryDatabase,
  type MemoryDatabase,
} from '../../helpers/memory-db.js';

const WEBHOOK_ACTOR: ActorContext = {
  type: 'webhook',
  requestId: 'req_webhook',
};

const BEARER = { authorization: `Bearer ${TEST_SECRET}` };

function webhookInput(
  event: Record<string, unknown> = {},
  headers: { authorization?: string; signature?: string } = BEARER
) {
  return {
    provider: 'revenuecat' as const,
    rawBody: JSON.stringify(createRevenueCatPayload(event)),
    headers,
  };
}

describe('SubscriptionEventService', () => {
  let database: MemoryDatabase;
  let mockAuditService: { log: ReturnType<typeof vi.fn> };
  let service: SubscriptionEventService;

  beforeEach(() => {
    const clock = createTestClock(TEST_NOW);
    database = createMemoryDatabase(clock.now, [createTestAccount()]);
    mockAuditService = {
      log: vi.fn().mockResolvedValue({ success: true, data: undefined }),
    };
    service = createSubscriptionEventService({
      db: database.eventDb,
      auditService: mockAuditService,
      webhookSecret: TEST_SECRET,
      clock: clock.now,
    });
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  describe('isOutOfOrder', () => {
    const last = new Date('2025-03-12T09:00:00.000Z');

    it('should only treat strictly older events as stale', () => {
      expect(isOutOfOrder({ lastSubscriptionEventAt: null }, last)).toBe(false);
      expect(isOutOfOrder({ lastSubscriptionEventAt: last }, last)).toBe(false);
      expect(
        isOutOfOrder(
          { lastSubscriptionEventAt: last },
          new Date('2025-03-12T08:59:59.999Z')
        )
      ).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────
  // APPLYING EVENTS
  // ─────────────────────────────────────────────────────────────

  describe('processWebhook', () => {
    it('should apply a purchase to the account', async () => {
      const result = await service.processWebhook(WEBHOOK_ACTOR, webhookInput());

      expect(result).toEqual({
        success: true,
        data: {
          status: 'ok',
          idempotent: false,
          event_id: 'evt_001',
          processing_status: 'APPLIED',
          user_id: TEST_USER_ID,
          plan: 'PRO',
          subscription_status: 'ACTIVE',
          subscription_expires_at: '2025-04-12T09:00:00.000Z',
        },
      });

      const account = database.accounts.get(TEST_USER_ID);
      expect(account?.plan).toBe('PRO');
      expect(account?.firstUpgradeUsed).toBe(true);
      expect(account?.lastSubscriptionEventAt).toEqual(
        new Date('2025-03-12T09:00:00.000Z')
      );
      expect(database.ledger.get('evt_001')?.processingStatus).toBe('APPLIED');
    });

    it('should accept an HMAC signature', async () => {
      const input = webhookInput();
      input.headers = { signature: signBody(input.rawBody) };

      const result = await service.processWebhook(WEBHOOK_ACTOR, input);

      expect(result.success).toBe(true);
    });

    it('should audit the callback and the account change', async () => {
      const input = webhookInput();

      await service.processWebhook(WEBHOOK_ACTOR, input);

      expect(mockAuditService.log).toHaveBeenCalledTimes(2);
      expect(mockAuditService.log).toHaveBeenNthCalledWith(1, WEBHOOK_ACTOR, {
        action: 'SUBSCRIPTION_WEBHOOK_EVENT',
        resourceType: 'user',
        resourceId: TEST_USER_ID,
        details: { event_type: 'INITIAL_PURCHASE', payload: input.rawBody },
      });
      expect(mockAuditService.log).toHaveBeenNthCalledWith(2, WEBHOOK_ACTOR, {
        action: 'SUBSCRIPTION_UPDATED',
        resourceType: 'user',
        resourceId: TEST_USER_ID,
        details: {
          event_id: 'evt_001',
          event_type: 'INITIAL_PURCHASE',
          previous_plan: 'FREE',
          plan: 'PRO',
          previous_status: 'ACTIVE',
          subscription_status: 'ACTIVE',
          subscription_expires_at: '2025-04-12T09:00:00.000Z',
          event_at: '2025-03-12T09:00:00.000Z',
        },
      });
    });

    it('should keep first_upgrade_used once the plan drops back to FREE', async () => {
      await service.processWebhook(WEBHOOK_ACTOR, webhookInput());
      await service.processWebhook(
        WEBHOOK_ACTOR,
        webhookInput({
          id: 'evt_002',
          type: 'EXPIRATION',
          product_id: 'coins_100',
          expiration_at_ms: undefined,
          event_timestamp_ms: Date.parse('2025-03-12T09:30:00.000Z'),
        })
      );

      const account = database.accounts.get(TEST_USER_ID);
      expect(account?.plan).toBe('FREE');
      expect(account?.firstUpgradeUsed).toBe(true);
    });

    it('should apply an event with the same timestamp as the last one', async () => {
      await service.processWebhook(WEBHOOK_ACTOR, webhookInput());

      const result = await service.processWebhook(
        WEBHOOK_ACTOR,
        webhookInput({ id: 'evt_002', product_id: 'ultra_monthly' })
      );

      expect(result.success && result.data.processing_status).toBe('APPLIED');
      expect(database.accounts.get(TEST_USER_ID)?.plan).toBe('ULTRA');
    });

    // ─────────────────────────────────────────────────────────────
    // IDEMPOTENCY AND ORDERING
    // ─────────────────────────────────────────────────────────────

    it('should treat a redelivered event as an idempotent no-op', async () => {
      await service.processWebhook(WEBHOOK_ACTOR, webhookInput());
      const before = database.accounts.get(TEST_USER_ID);

      const result = await service.processWebhook(WEBHOOK_ACTOR, webhookInput());

      expect(result).toEqual({
        success: true,
        data: {
          status: 'ok',
          idempotent: true,
          event_id: 'evt_001',
          processing_status: 'DUPLICATE',
        },
      });
      expect(database.ledger.size).toBe(1);
      expect(database.accounts.get(TEST_USER_ID)).toEqual(before);
      expect(database.stats.transactions).toBe(1);
    });

    it('should apply concurrent deliveries of one event exactly once', async () => {
      const input = webhookInput({ id: 'evt_123' });

      const [first, second] = await Promise.all([
        service.processWebhook(WEBHOOK_ACTOR, input),
        service.processWebhook(WEBHOOK_ACTOR, input),
      ]);

      expect(first.success && first.data.idempotent).toBe(false);
      expect(second.success && second.data.idempotent).toBe(true);
      expect(database.ledger.size).toBe(1);
      expect(database.ledger.get('evt_123')?.processingStatus).toBe('APPLIED');
      expect(database.stats.commits).toBe(1);
      expect(database.stats.rollbacks).toBe(1);
    });

    it('should record but not apply an event older than the last applied one', async () => {
      await service.processWebhook(
        WEBHOOK_ACTOR,
        webhookInput({
          id: 'evt_new',
          event_timestamp_ms: Date.parse('2025-03-12T09:50:00.000Z'),
        })
      );

      const result = await service.processWebhook(
        WEBHOOK_ACTOR,
        webhookInput({
          id: 'evt_old',
          type: 'EXPIRATION',
          product_id: 'coins_100',
          expiration_at_ms: undefined,
          event_timestamp_ms: Date.parse('2025-03-12T09:45:00.000Z'),
        })
      );

      expect(result).toEqual({
        success: true,
        data: {
          status: 'ok',
          idempotent: false,
          event_id: 'evt_old',
          processing_status: 'IGNORED_OUT_OF_ORDER',
          user_id: TEST_USER_ID,
          plan: 'PRO',
          subscription_status: 'ACTIVE',
          subscription_expires_at: '2025-04-12T09:00:00.000Z',
        },
      });
      expect(database.ledger.get('evt_old')?.processingStatus).toBe(
        'IGNORED_OUT_OF_ORDER'
      );
      expect(database.accounts.get(TEST_USER_ID)?.lastSubscriptionEventAt).toEqual(
        new Date('2025-03-12T09:50:00.000Z')
      );
      expect(mockAuditService.log).toHaveBeenLastCalledWith(WEBHOOK_ACTOR, {
        action: 'SUBSCRIPTION_EVENT_IGNORED',
        resourceType: 'subscription_event',
        resourceId: 'evt_old',
        details: {
          user_id: TEST_USER_ID,
          event_type: 'EXPIRATION',
          event_at: '2025-03-12T09:45:00.000Z',
          last_subscription_event_at: '2025-03-12T09:50:00.000Z',
        },
      });
    });

    // ─────────────────────────────────────────────────────────────
    // REJECTIONS
    // ─────────────────────────────────────────────────────────────

    it('should reject a bad signature before touching the ledger', async () => {
      const result = await service.processWebhook(
        WEBHOOK_ACTOR,
        webhookInput({}, { authorization: 'Bearer wrong-secret' })
      );

      expect(result).toEqual({
        success: false,
        error: { code: 'INVALID_SIGNATURE', message: 'Invalid webhook signature' },
      });
      expect(database.ledger.size).toBe(0);
      expect(mockAuditService.log).not.toHaveBeenCalled();
    });

    it('should reject a body that is not JSON', async () => {
      const result = await service.processWebhook(WEBHOOK_ACTOR, {
        provider: 'revenuecat',
        rawBody: '{"event":',
        headers: BEARER,
      });

      expect(!result.success && result.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid JSON payload',
      });
    });

    it('should audit and reject a malformed event', async () => {
      const input = webhookInput({ expiration_at_ms: undefined });

      const result = await service.processWebhook(WEBHOOK_ACTOR, input);

      expect(!result.success && result.error.code).toBe('MALFORMED_EVENT');
      expect(mockAuditService.log).toHaveBeenCalledWith(WEBHOOK_ACTOR, {
        action: 'SUBSCRIPTION_WEBHOOK_EVENT',
        resourceType: 'user',
        resourceId: null,
        details: { event_type: 'INITIAL_PURCHASE', payload: input.rawBody },
      });
      expect(database.ledger.size).toBe(0);
    });

    it.each(['CANCELLATION', 'BILLING_ISSUE'])(
      'should leave a free account unchanged on a paid %s without expiry',
      async (type) => {
        const result = await service.processWebhook(
          WEBHOOK_ACTOR,
          webhookInput({ type, expiration_at_ms: undefined })
        );

        expect(!result.success && result.error.code).toBe('MALFORMED_EVENT');
        expect(database.ledger.size).toBe(0);
        expect(database.accounts.get(TEST_USER_ID)).toMatchObject({
          plan: 'FREE',
          subscriptionExpiresAt: null,
          firstUpgradeUsed: false,
        });
      }
    );

    it('should reject an event for an unknown account without a ledger row', async () => {
      const result = await service.processWebhook(
        WEBHOOK_ACTOR,
        webhookInput({ app_user_id: OTHER_USER_ID })
      );

      expect(result).toEqual({
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: 'User not found',
          details: { event_id: 'evt_001' },
        },
      });
      expect(database.ledger.size).toBe(0);
    });

    it('should truncate the audited payload', async () => {
      const input = webhookInput({ note: 'x'.repeat(3000) });

      await service.processWebhook(WEBHOOK_ACTOR, input);

      expect(mockAuditService.log).toHaveBeenNthCalledWith(1, WEBHOOK_ACTOR, {
        action: 'SUBSCRIPTION_WEBHOOK_EVENT',
        resourceType: 'user',
        resourceId: TEST_USER_ID,
        details: {
          event_type: 'INITIAL_PURCHASE',
          payload: input.rawBody.slice(0, 2000),
        },
      });
    });

    it('should throw when the database is unreachable', async () => {
      database.unavailable = true;

      await expect(
        service.processWebhook(WEBHOOK_ACTOR, webhookInput())
      ).rejects.toBeInstanceOf(InfrastructureUnavailableError);
    });
  });
});
