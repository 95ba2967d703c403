/**
 * SubscriptionEventService Implementation
 *
 * Purpose: Apply billing provider callbacks to account subscription state.
 * Owns: subscription_events, users subscription fields (event path)
 * Dependencies: AuditService
 *
 * Guarantees:
 * - one ledger row per provider event id; redelivery is an idempotent no-op
 * - events older than the last applied one are recorded but not applied
 * - ledger insert and account update commit together under a row lock
 */

import { DuplicateEventError } from '../lib/errors.js';
import { isPaidPlan } from '../policy/plans.js';
import type {
  ActorContext,
  Account,
  CanonicalEvent,
  Result,
  WebhookHeaders,
  WebhookOutcome,
  WebhookProvider,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { AuditService } from './audit.service.js';
import { parseRevenueCatPayload, verifyRevenueCatSignature } from './revenuecat.js';
import type { SubscriptionEventDb } from './subscription-event.db.js';

const AUDIT_PAYLOAD_MAX_LENGTH = 2000;

export interface WebhookInput {
  provider: WebhookProvider;
  rawBody: string;
  headers: WebhookHeaders;
}

/**
 * SubscriptionEventService interface
 */
export interface SubscriptionEventService {
  processWebhook(
    actor: ActorContext,
    input: WebhookInput
  ): Promise<Result<WebhookOutcome>>;
}

type TransactionOutcome =
  | { kind: 'not_found' }
  | { kind: 'ignored'; account: Account }
  | { kind: 'applied'; previous: Account; account: Account };

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * Monotonic apply rule: an event is stale only when strictly older than
 * the last applied one.
 */
export function isOutOfOrder(
  account: Pick<Account, 'lastSubscriptionEventAt'>,
  eventAt: Date
): boolean {
  const last = account.lastSubscriptionEventAt;
  return last !== null && eventAt.getTime() < last.getTime();
}

function accountOutcome(
  eventId: string,
  account: Account,
  processingStatus: 'APPLIED' | 'IGNORED_OUT_OF_ORDER'
): WebhookOutcome {
  return {
    status: 'ok',
    idempotent: false,
    event_id: eventId,
    processing_status: processingStatus,
    user_id: account.id,
    plan: account.plan,
    subscription_status: account.subscriptionStatus,
    subscription_expires_at: account.subscriptionExpiresAt?.toISOString() ?? null,
  };
}

function duplicateOutcome(eventId: string): WebhookOutcome {
  return {
    status: 'ok',
    idempotent: true,
    event_id: eventId,
    processing_status: 'DUPLICATE',
  };
}

/**
 * Create SubscriptionEventService instance
 */
export function createSubscriptionEventService(deps: {
  db: SubscriptionEventDb;
  auditService: AuditService;
  webhookSecret: string;
  clock?: () => Date;
}): SubscriptionEventService {
  const { db, auditService, webhookSecret } = deps;
  const clock = deps.clock ?? (() => new Date());

  async function logWebhook(
    actor: ActorContext,
    userId: string | null,
    eventType: string,
    payload: unknown
  ): Promise<void> {
    const compact = (JSON.stringify(payload) ?? '').slice(
      0,
      AUDIT_PAYLOAD_MAX_LENGTH
    );
    await auditService.log(actor, {
      action: 'SUBSCRIPTION_WEBHOOK_EVENT',
      resourceType: 'user',
      resourceId: userId,
      details: { event_type: eventType, payload: compact },
    });
  }

  async function applyInTransaction(
    event: CanonicalEvent,
    payloadText: string
  ): Promise<TransactionOutcome> {
    return db.transaction(async (tx) => {
      const account = await tx.lockAccount(event.userId);
      if (account === null) {
        return { kind: 'not_found' };
      }

      const inserted = await tx.insertEvent({
        eventId: event.eventId,
        userId: account.id,
        eventType: event.eventType,
        eventAt: event.eventAt,
        processingStatus: 'RECEIVED',
        payload: payloadText,
      });
      if (!inserted) {
        // Lost the race against a concurrent delivery; roll back
        throw new DuplicateEventError(event.eventId);
      }

      if (isOutOfOrder(account, event.eventAt)) {
        await tx.setEventStatus(event.eventId, 'IGNORED_OUT_OF_ORDER');
        return { kind: 'ignored', account };
      }

      const updated = await tx.applySubscription(account.id, {
        plan: event.plan,
        subscriptionStatus: event.status,
        subscriptionExpiresAt: event.expiresAt,
        lastSubscriptionEventAt: event.eventAt,
        firstUpgradeUsed:
          account.firstUpgradeUsed ||
          (account.plan === 'FREE' && isPaidPlan(event.plan)),
      });
      await tx.setEventStatus(event.eventId, 'APPLIED');
      return { kind: 'applied', previous: account, account: updated };
    });
  }

  return {
    async processWebhook(
      actor: ActorContext,
      input: WebhookInput
    ): Promise<Result<WebhookOutcome>> {
      if (!verifyRevenueCatSignature(input.headers, input.rawBody, webhookSecret)) {
        return failure('INVALID_SIGNATURE', 'Invalid webhook signature');
      }

      let payload: unknown;
      try {
        payload = JSON.parse(input.rawBody);
      } catch {
        return failure('VALIDATION_ERROR', 'Invalid JSON payload');
      }

      const parsed = parseRevenueCatPayload(payload, clock());
      if (!parsed.success) {
        const eventType = parsed.error.details?.['event_type'];
        await logWebhook(
          actor,
          null,
          typeof eventType === 'string' ? eventType : 'UNKNOWN_PARSE_ERROR',
          payload
        );
        return parsed;
      }
      const event = parsed.data;

      if ((await db.findEvent(event.eventId)) !== null) {
        await logWebhook(actor, null, `${event.eventType}_DUPLICATE`, payload);
        return success(duplicateOutcome(event.eventId));
      }

      let outcome: TransactionOutcome;
      try {
        outcome = await applyInTransaction(event, JSON.stringify(payload));
      } catch (err) {
        if (err instanceof DuplicateEventError) {
          await logWebhook(actor, null, `${event.eventType}_DUPLICATE`, payload);
          return success(duplicateOutcome(event.eventId));
        }
        throw err;
      }

      if (outcome.kind === 'not_found') {
        await logWebhook(actor, null, event.eventType, payload);
        return failure('NOT_FOUND', 'User not found', {
          event_id: event.eventId,
        });
      }

      await logWebhook(actor, outcome.account.id, event.eventType, payload);

      if (outcome.kind === 'ignored') {
        await auditService.log(actor, {
          action: 'SUBSCRIPTION_EVENT_IGNORED',
          resourceType: 'subscription_event',
          resourceId: event.eventId,
          details: {
            user_id: outcome.account.id,
            event_type: event.eventType,
            event_at: event.eventAt.toISOString(),
            last_subscription_event_at:
              outcome.account.lastSubscriptionEventAt?.toISOString() ?? null,
          },
        });
        return success(
          accountOutcome(event.eventId, outcome.account, 'IGNORED_OUT_OF_ORDER')
        );
      }

      const { previous, account } = outcome;
      await auditService.log(actor, {
        action: 'SUBSCRIPTION_UPDATED',
        resourceType: 'user',
        resourceId: account.id,
        details: {
          event_id: event.eventId,
          event_type: event.eventType,
          previous_plan: previous.plan,
          plan: account.plan,
          previous_status: previous.subscriptionStatus,
          subscription_status: account.subscriptionStatus,
          subscription_expires_at:
            account.subscriptionExpiresAt?.toISOString() ?? null,
          event_at: event.eventAt.toISOString(),
        },
      });
      console.info(
        `subscription_event user_id=${account.id} event=${event.eventType} plan:${previous.plan}->${account.plan}`
      );
      return success(accountOutcome(event.eventId, account, 'APPLIED'));
    },
  };
}
