/**
 * Account Subscription Types
 *
 * The account aggregate owns the current subscription state. The event ledger
 * only records history.
 */

export const PLAN_CODES = [
  'FREE',
  'PRO',
  'ULTRA',
  'FAMILY_BASIC',
  'FAMILY_PRO',
] as const;

export type PlanCode = (typeof PLAN_CODES)[number];

export const SUBSCRIPTION_STATUSES = [
  'ACTIVE',
  'EXPIRED',
  'CANCELED',
  'GRACE',
] as const;

export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

const SUBSCRIPTION_STATUS_VALUES: readonly string[] = SUBSCRIPTION_STATUSES;

/**
 * Limit kinds backed by a persisted counter column instead of the cache
 */
export type LifetimeLimitKind = 'AI_IMAGE_LIFETIME';

/**
 * Account record as seen by the quota and subscription subsystems
 */
export interface Account {
  id: string;
  plan: PlanCode;
  subscriptionStatus: SubscriptionStatus;
  subscriptionExpiresAt: Date | null; // null only on the free plan
  lastSubscriptionEventAt: Date | null;
  firstUpgradeUsed: boolean;
  lifetimeUsage: Record<LifetimeLimitKind, number>;
  createdAt: Date | null;
}

export function isSubscriptionStatus(
  value: unknown
): value is SubscriptionStatus {
  return (
    typeof value === 'string' &&
    SUBSCRIPTION_STATUS_VALUES.includes(value)
  );
}
