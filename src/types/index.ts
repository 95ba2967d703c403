/**
 * Core type definitions
 * Shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export { success, failure } from './result.js';
export type { ActorContext } from './auth.js';
export { SYSTEM_ACTOR } from './auth.js';
export type { AuditAction, AuditEvent } from './audit.js';
export type {
  Account,
  PlanCode,
  SubscriptionStatus,
  LifetimeLimitKind,
} from './account.js';
export {
  PLAN_CODES,
  SUBSCRIPTION_STATUSES,
  isSubscriptionStatus,
} from './account.js';
export type {
  LimitKind,
  CalendarWindow,
  LimitWindow,
  DiscountEligibility,
  UpgradeGuidance,
  QuotaExceededDetails,
  QuotaGrant,
} from './quota.js';
export { LIMIT_KINDS, isLimitKind } from './quota.js';
export type {
  LedgerStatus,
  WebhookProvider,
  CanonicalEvent,
  LedgerEntry,
  NewLedgerEntry,
  SubscriptionUpdate,
  WebhookOutcome,
  WebhookHeaders,
} from './subscription.js';
