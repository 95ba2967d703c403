/**
 * Service Layer Exports
 *
 * Services own the business rules; *.db.ts and *.store.ts adapters are the
 * only modules that talk to Postgres, Supabase or Redis.
 */

// AuditService
export type { AuditService, AuditServiceDb, AuditLogEntry } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// Counter store and rate-limit primitives
export type { CounterStore, CounterStoreClient } from './counter.store.js';
export { createUpstashCounterStore } from './counter.store.js';
export type { RateLimitPrimitives } from './rate-limit.service.js';
export { buildKey, createRateLimitPrimitives } from './rate-limit.service.js';

// AccountService (lazy downgrade)
export type { AccountDb } from './account.db.js';
export { createAccountDb } from './account.db.js';
export type { AccountService } from './account.service.js';
export { createAccountService, resolveEffectivePlan } from './account.service.js';

// Quotas
export type { LifetimeUsageGuard } from './lifetime-usage.service.js';
export { createLifetimeUsageGuard } from './lifetime-usage.service.js';
export type { QuotaService } from './quota.service.js';
export { createQuotaService } from './quota.service.js';
export type { EmailScanGuard } from './email-scan-guard.service.js';
export { createEmailScanGuard } from './email-scan-guard.service.js';

// Subscription events
export type {
  SubscriptionEventDb,
  SubscriptionEventTx,
} from './subscription-event.db.js';
export { createSubscriptionEventDb } from './subscription-event.db.js';
export type {
  SubscriptionEventService,
  WebhookInput,
} from './subscription-event.service.js';
export { createSubscriptionEventService } from './subscription-event.service.js';
export {
  parseRevenueCatPayload,
  verifyRevenueCatSignature,
} from './revenuecat.js';
