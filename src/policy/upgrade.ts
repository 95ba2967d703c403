/**
 * Upgrade guidance attached to quota and feature denials
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

import type {
  Account,
  DiscountEligibility,
  UpgradeGuidance,
} from '../types/index.js';

import { getUpgradeRecommendation } from './plans.js';

dayjs.extend(utc);

const DISCOUNT_WINDOW_DAYS = 30;

const DEFAULT_BENEFITS = ['Higher limits and premium security features'];

export function buildUpgradeGuidance(
  account: Pick<Account, 'plan' | 'firstUpgradeUsed' | 'createdAt'>,
  feature: string | null,
  now: Date
): UpgradeGuidance {
  const recommendation =
    feature !== null ? getUpgradeRecommendation(feature) : undefined;

  return {
    recommended_plan:
      recommendation?.recommended_plan ??
      (account.plan === 'FREE' ? 'PRO' : 'ULTRA'),
    benefits: recommendation?.benefits ?? DEFAULT_BENEFITS,
    discount_eligibility: discountEligibility(account, now),
  };
}

/**
 * First-upgrade promotional pricing: open for the first 30 days of an
 * account, and only until the account has upgraded once.
 */
function discountEligibility(
  account: Pick<Account, 'firstUpgradeUsed' | 'createdAt'>,
  now: Date
): DiscountEligibility {
  if (account.firstUpgradeUsed) {
    return {
      eligible: false,
      window_days: DISCOUNT_WINDOW_DAYS,
      reason: 'first_upgrade_already_used',
    };
  }

  if (account.createdAt === null) {
    return {
      eligible: false,
      window_days: DISCOUNT_WINDOW_DAYS,
      reason: 'created_at_unavailable',
    };
  }

  const discountUntil = dayjs.utc(account.createdAt).add(
    DISCOUNT_WINDOW_DAYS,
    'day'
  );
  return {
    eligible: dayjs.utc(now).isBefore(discountUntil),
    window_days: DISCOUNT_WINDOW_DAYS,
    expires_at: discountUntil.toISOString(),
    days_remaining: Math.max(0, discountUntil.diff(now, 'day')),
  };
}
