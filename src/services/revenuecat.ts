/**
 * RevenueCat webhook helpers
 * Authenticity check and reduction of a callback to a CanonicalEvent
 */

import { createHash, createHmac, timingSafeEqual } from 'node:crypto';

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { z } from 'zod';

import { isPaidPlan } from '../policy/plans.js';
import type {
  CanonicalEvent,
  PlanCode,
  Result,
  SubscriptionStatus,
  WebhookHeaders,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

dayjs.extend(utc);

// Epoch values above this are milliseconds
const EPOCH_MS_THRESHOLD = 10_000_000_000;

const CANCELED_EVENT_TYPES = new Set([
  'CANCELLATION',
  'SUBSCRIPTION_CANCELED',
  'REFUND',
  'UNCANCELLATION_REVERSED',
]);

const GRACE_EVENT_TYPES = new Set([
  'BILLING_ISSUE',
  'SUBSCRIPTION_EXTENDED',
  'TEMPORARY_ENTITLEMENT_GRANT',
]);

const idValue = z.union([z.string(), z.number()]).nullish();
const timeValue = z.union([z.string(), z.number()]).nullish();

const eventSchema = z
  .object({
    id: idValue,
    event_id: idValue,
    type: z.string().nullish(),
    app_user_id: idValue,
    original_app_user_id: idValue,
    user_id: idValue,
    product_id: z.string().nullish(),
    store_product_id: z.string().nullish(),
    entitlement_ids: z.array(z.string()).nullish(),
    expiration_at_ms: timeValue,
    expires_date_ms: timeValue,
    expiration_at: timeValue,
    expires_date: timeValue,
    event_timestamp_ms: timeValue,
    event_timestamp: timeValue,
    purchased_at_ms: timeValue,
    purchased_at: timeValue,
    event_created_at_ms: timeValue,
    event_created_at: timeValue,
  })
  .passthrough();

type RevenueCatEvent = z.infer<typeof eventSchema>;

const envelopeSchema = z.object({ event: eventSchema }).passthrough();

// ─────────────────────────────────────────────────────────────
// AUTHENTICITY
// ─────────────────────────────────────────────────────────────

function constantTimeEquals(a: string, b: string): boolean {
  // Hash first so differing lengths do not short-circuit
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

/**
 * Accepts either `Authorization: Bearer <secret>` or a hex HMAC-SHA256 of
 * the raw body in the signature header.
 */
export function verifyRevenueCatSignature(
  headers: WebhookHeaders,
  rawBody: string,
  secret: string
): boolean {
  const auth = headers.authorization ?? '';
  if (auth.toLowerCase().startsWith('bearer ')) {
    const supplied = auth.slice('bearer '.length).trim();
    if (constantTimeEquals(supplied, secret)) {
      return true;
    }
  }

  const signature = headers.signature?.trim();
  if (signature !== undefined && signature !== '') {
    const digest = createHmac('sha256', secret).update(rawBody).digest('hex');
    if (constantTimeEquals(signature.toLowerCase(), digest)) {
      return true;
    }
  }

  return false;
}

// ─────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────

/**
 * First value that is present and non-empty
 */
function firstPresent<T extends string | number>(
  ...values: (T | null | undefined)[]
): T | null {
  for (const value of values) {
    if (value !== null && value !== undefined && value !== '' && value !== 0) {
      return value;
    }
  }
  return null;
}

/**
 * Epoch seconds, epoch milliseconds or ISO-8601. Times without an offset
 * are UTC.
 */
export function parseProviderTime(value: string | number | null): Date | null {
  if (value === null) {
    return null;
  }
  const text = String(value).trim();
  if (text === '') {
    return null;
  }
  if (typeof value === 'number' || /^\d+(\.\d+)?$/.test(text)) {
    const epoch = Number(text);
    const ms = epoch > EPOCH_MS_THRESHOLD ? epoch : epoch * 1000;
    const date = new Date(Math.floor(ms));
    return Number.isNaN(date.getTime()) ? null : date;
  }
  const parsed = dayjs.utc(text);
  return parsed.isValid() ? parsed.toDate() : null;
}

export function derivePlan(event: RevenueCatEvent): PlanCode {
  const candidate = [
    event.product_id ?? '',
    event.store_product_id ?? '',
    ...(event.entitlement_ids ?? []),
  ]
    .join(' ')
    .toUpperCase();

  if (candidate.includes('ULTRA') || candidate.includes('ENTERPRISE')) {
    return 'ULTRA';
  }
  if (candidate.includes('FAMILY_PRO')) {
    return 'FAMILY_PRO';
  }
  if (candidate.includes('FAMILY')) {
    return 'FAMILY_BASIC';
  }
  if (['PRO', 'PAID', 'PREMIUM'].some((token) => candidate.includes(token))) {
    return 'PRO';
  }
  return 'FREE';
}

function deriveStatus(
  eventType: string,
  expiresAt: Date | null,
  now: Date
): SubscriptionStatus {
  if (CANCELED_EVENT_TYPES.has(eventType)) {
    return 'CANCELED';
  }
  if (GRACE_EVENT_TYPES.has(eventType)) {
    return 'GRACE';
  }
  if (expiresAt !== null && expiresAt.getTime() < now.getTime()) {
    return 'EXPIRED';
  }
  return 'ACTIVE';
}

/**
 * Reduce a parsed JSON body to a CanonicalEvent.
 * `now` is the receipt time, used when the event carries no timestamp.
 */
export function parseRevenueCatPayload(
  payload: unknown,
  now: Date
): Result<CanonicalEvent> {
  const envelope = envelopeSchema.safeParse(payload);
  const parsed = envelope.success
    ? { success: true as const, data: envelope.data.event }
    : eventSchema.safeParse(payload);

  if (!parsed.success) {
    return failure('MALFORMED_EVENT', 'Webhook payload is not a valid event');
  }
  const event = parsed.data;

  const eventType = (event.type ?? 'UNKNOWN').toUpperCase();
  const eventId = String(firstPresent(event.id, event.event_id) ?? '').trim();
  if (eventId === '') {
    return failure('MALFORMED_EVENT', 'event_id is required', {
      event_type: eventType,
    });
  }

  const userRef = firstPresent(
    event.app_user_id,
    event.original_app_user_id,
    event.user_id
  );
  if (userRef === null) {
    return failure('MALFORMED_EVENT', 'app_user_id is required', {
      event_id: eventId,
      event_type: eventType,
    });
  }

  const plan = derivePlan(event);
  const expiresAt = parseProviderTime(
    firstPresent(
      event.expiration_at_ms,
      event.expires_date_ms,
      event.expiration_at,
      event.expires_date
    )
  );
  const eventAt =
    parseProviderTime(
      firstPresent(
        event.event_timestamp_ms,
        event.event_timestamp,
        event.purchased_at_ms,
        event.purchased_at,
        event.event_created_at_ms,
        event.event_created_at
      )
    ) ?? now;
  const status = deriveStatus(eventType, expiresAt, now);

  // A paid plan without an expiry would never lapse, whatever its status
  if (isPaidPlan(plan) && expiresAt === null) {
    return failure(
      'MALFORMED_EVENT',
      'Paid-plan events require expiration timestamp',
      { event_id: eventId, event_type: eventType }
    );
  }

  return success({
    eventId,
    eventType,
    userId: String(userRef),
    plan,
    status,
    expiresAt,
    eventAt,
    rawPayload: payload,
  });
}
