/**
 * Plan Policy
 *
 * Pure lookups over the plan tables in config/plan-policy.json. This is the
 * only place a stored plan string is turned into a PlanCode.
 */

import { readFileSync } from 'node:fs';

import { z } from 'zod';

import {
  PLAN_CODES,
  type LifetimeLimitKind,
  type LimitKind,
  type CalendarWindow,
  type PlanCode,
} from '../types/index.js';

export const FEATURES = [
  'EMAIL_BREACH_COUNT',
  'EMAIL_BREACH_DETAILS',
  'OCR_SCAN',
  'AI_EXPLAIN',
  'RISK_INSIGHTS',
  'CYBER_CARD_ACCESS',
  'QR_UNLIMITED',
  'TRUSTED_CONTACT_LIMIT',
  'FAMILY_ALERTS',
  'PRIORITY_SOS',
  'ULTRA_PRIORITY_PIPELINE',
] as const;

export type Feature = (typeof FEATURES)[number];

const FEATURE_VALUES: readonly string[] = FEATURES;

export type LimitDefinition = {
  /** Label used for cooldown keys, audit entries and upgrade guidance */
  feature: string;
} & (
  | { window: CalendarWindow; namespace: string }
  | { window: 'lifetime'; counter: LifetimeLimitKind }
);

export const LIMIT_DEFINITIONS: Record<LimitKind, LimitDefinition> = {
  THREAT_DAILY: {
    window: 'daily',
    namespace: 'plan-limit:threat:daily',
    feature: 'THREAT_SCAN',
  },
  EMAIL_MONTHLY: {
    window: 'monthly',
    namespace: 'plan-limit:email:monthly',
    feature: 'EMAIL_BREACH_COUNT',
  },
  PASSWORD_MONTHLY: {
    window: 'monthly',
    namespace: 'plan-limit:password:monthly',
    feature: 'PASSWORD_SCAN',
  },
  QR_WEEKLY: {
    window: 'weekly',
    namespace: 'plan-limit:qr:weekly',
    feature: 'QR_UNLIMITED',
  },
  AI_IMAGE_LIFETIME: {
    window: 'lifetime',
    counter: 'AI_IMAGE_LIFETIME',
    feature: 'AI_IMAGE_SCAN',
  },
};

const PLAN_ALIASES: Record<string, PlanCode> = {
  FREE: 'FREE',
  GO_FREE: 'FREE',
  GOFREE: 'FREE',
  PRO: 'PRO',
  GO_PRO: 'PRO',
  GOPRO: 'PRO',
  PAID: 'PRO',
  PREMIUM: 'PRO',
  ULTRA: 'ULTRA',
  GO_ULTRA: 'ULTRA',
  GOULTRA: 'ULTRA',
  ENTERPRISE: 'ULTRA',
  FAMILY_BASIC: 'FAMILY_BASIC',
  FAMILY_PRO: 'FAMILY_PRO',
};

// ─────────────────────────────────────────────────────────────
// POLICY TABLES
// ─────────────────────────────────────────────────────────────

const ceilingSchema = z.number().int().nonnegative().nullable();

const limitTableSchema = z.object({
  THREAT_DAILY: ceilingSchema,
  EMAIL_MONTHLY: ceilingSchema,
  PASSWORD_MONTHLY: ceilingSchema,
  QR_WEEKLY: ceilingSchema,
  AI_IMAGE_LIFETIME: ceilingSchema,
});

function perPlan<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    FREE: schema,
    PRO: schema,
    ULTRA: schema,
    FAMILY_BASIC: schema,
    FAMILY_PRO: schema,
  });
}

const positiveInt = z.number().int().positive();

const policySchema = z.object({
  limits: perPlan(limitTableSchema),
  features: perPlan(z.array(z.enum(FEATURES))),
  guardrails: z.object({
    EMAIL_MAX_LENGTH: positiveInt,
    EMAIL_GLOBAL_COOLDOWN_SECONDS: positiveInt,
    EMAIL_DUPLICATE_SCAN_BLOCK_SECONDS: positiveInt,
    EMAIL_RATE_WINDOW_SECONDS: positiveInt,
    EMAIL_RATE_LIMIT_USER: positiveInt,
    EMAIL_RATE_LIMIT_IP: positiveInt,
    IP_RATE_WINDOW_SECONDS: positiveInt,
    IP_RATE_LIMIT: positiveInt,
  }),
  upgrades: z.record(
    z.string(),
    z.object({
      recommended_plan: z.enum(PLAN_CODES),
      benefits: z.array(z.string()).min(1),
    })
  ),
});

export type Guardrails = z.infer<typeof policySchema>['guardrails'];

export interface UpgradeRecommendation {
  recommended_plan: PlanCode;
  benefits: string[];
}

const policy = policySchema.parse(
  JSON.parse(
    readFileSync(
      new URL('../../config/plan-policy.json', import.meta.url),
      'utf-8'
    )
  )
);

const upgradeRecommendations = new Map<string, UpgradeRecommendation>(
  Object.entries(policy.upgrades)
);

// ─────────────────────────────────────────────────────────────
// LOOKUPS
// ─────────────────────────────────────────────────────────────

/**
 * Canonical plan resolution. Unknown, empty and legacy values collapse to a
 * known plan; anything unrecognised is FREE.
 */
export function normalizePlan(raw: string | null | undefined): PlanCode {
  if (raw === null || raw === undefined) {
    return 'FREE';
  }
  const key = raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return PLAN_ALIASES[key] ?? 'FREE';
}

export function isPaidPlan(plan: PlanCode): boolean {
  return plan !== 'FREE';
}

/**
 * Ceiling for a limit kind on a plan; null means unlimited
 */
export function limitFor(plan: PlanCode, kind: LimitKind): number | null {
  return policy.limits[plan][kind];
}

export function hasFeature(plan: PlanCode, feature: Feature): boolean {
  return policy.features[plan].includes(feature);
}

export function isFeature(value: string): value is Feature {
  return FEATURE_VALUES.includes(value);
}

export function getGuardrails(): Readonly<Guardrails> {
  return policy.guardrails;
}

export function getUpgradeRecommendation(
  feature: string
): UpgradeRecommendation | undefined {
  return upgradeRecommendations.get(feature);
}
