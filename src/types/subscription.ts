/**
 * Subscription Event Types
 */

import type { PlanCode, SubscriptionStatus } from './account.js';

export type LedgerStatus =
  | 'RECEIVED'
  | 'APPLIED'
  | 'IGNORED_OUT_OF_ORDER'
  | 'DUPLICATE';

export type WebhookProvider = 'revenuecat';

/**
 * Provider callback reduced to the fields the processor acts on
 */
export interface CanonicalEvent {
  eventId: string;
  eventType: string;
  userId: string;
  plan: PlanCode;
  status: SubscriptionStatus;
  expiresAt: Date | null;
  eventAt: Date; // provider-declared, receipt time only as a fallback
  rawPayload: unknown;
}

/**
 * Ledger row written once per distinct provider event id
 */
export interface LedgerEntry {
  eventId: string;
  userId: string | null;
  eventType: string;
  eventAt: Date | null;
  processingStatus: LedgerStatus;
  payload: string;
  createdAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'createdAt'>;

/**
 * Account fields written when an event is applied
 */
export interface SubscriptionUpdate {
  plan: PlanCode;
  subscriptionStatus: SubscriptionStatus;
  subscriptionExpiresAt: Date | null;
  lastSubscriptionEventAt: Date;
  firstUpgradeUsed: boolean;
}

/**
 * Webhook acknowledgment returned to the provider
 */
export interface WebhookOutcome {
  status: 'ok';
  idempotent: boolean;
  event_id: string;
  processing_status: Exclude<LedgerStatus, 'RECEIVED'>;
  user_id?: string;
  plan?: PlanCode;
  subscription_status?: SubscriptionStatus;
  subscription_expires_at?: string | null;
}

export interface WebhookHeaders {
  authorization?: string | undefined;
  signature?: string | undefined;
}
