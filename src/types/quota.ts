/**
 * Quota Types
 */

import type { PlanCode } from './account.js';

export const LIMIT_KINDS = [
  'THREAT_DAILY',
  'EMAIL_MONTHLY',
  'PASSWORD_MONTHLY',
  'QR_WEEKLY',
  'AI_IMAGE_LIFETIME',
] as const;

/**
 * A named quota dimension
 */
export type LimitKind = (typeof LIMIT_KINDS)[number];

const LIMIT_KIND_VALUES: readonly string[] = LIMIT_KINDS;

export type CalendarWindow = 'daily' | 'weekly' | 'monthly';

export type LimitWindow = CalendarWindow | 'lifetime';

/**
 * Discount metadata attached to upgrade guidance
 */
export interface DiscountEligibility {
  eligible: boolean;
  window_days: number;
  reason?: string;
  expires_at?: string;
  days_remaining?: number;
}

/**
 * Which plan removes a limit and what it adds
 */
export interface UpgradeGuidance {
  recommended_plan: PlanCode;
  benefits: string[];
  discount_eligibility: DiscountEligibility;
}

/**
 * Payload carried by a PLAN_LIMIT_EXCEEDED failure
 */
export type QuotaExceededDetails = {
  plan: PlanCode;
  limit_type: LimitKind;
  window: LimitWindow;
  limit: number;
  reason: 'plan_limit_exceeded' | 'limit_cooldown_active';
  upgrade: UpgradeGuidance;
};

/**
 * Successful quota check
 */
export interface QuotaGrant {
  limit_type: LimitKind;
  limit: number | null; // null = unlimited
}

export function isLimitKind(value: string): value is LimitKind {
  return LIMIT_KIND_VALUES.includes(value);
}
