/**
 * EmailScanGuard
 *
 * Abuse guardrails in front of the breach lookup provider, built from the
 * same rate-limit primitives as plan quotas with e-mail specific parameters.
 *
 * Order: the read-only cooldown and duplicate checks run first, so a blocked
 * request takes no window slot. The per-IP window counts every attempt from
 * that address, including ones the per-user window then refuses.
 */

import { getGuardrails } from '../policy/plans.js';
import type { Guardrails } from '../policy/plans.js';
import type { Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { RateLimitPrimitives } from './rate-limit.service.js';

export const EMAIL_NAMESPACES = {
  globalCooldown: 'email-scan:cooldown',
  userWindow: 'email-scan:user',
  ipWindow: 'email-scan:ip',
  duplicate: 'email-scan:duplicate',
} as const;

export interface EmailScanCheck {
  email: string;
}

export interface EmailScanGuard {
  check(
    userId: string,
    ip: string,
    email: string
  ): Promise<Result<EmailScanCheck>>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function rateLimited(
  reason: string,
  retryAfter: number
): Result<EmailScanCheck> {
  return failure('RATE_LIMITED', 'Too many e-mail scans', {
    reason,
    retryAfter,
  });
}

export function createEmailScanGuard(deps: {
  limiter: RateLimitPrimitives;
  guardrails?: Readonly<Guardrails>;
}): EmailScanGuard {
  const { limiter } = deps;
  const limits = deps.guardrails ?? getGuardrails();

  return {
    async check(userId, ip, email): Promise<Result<EmailScanCheck>> {
      const normalized = normalizeEmail(email);
      if (normalized === '' || normalized.length > limits.EMAIL_MAX_LENGTH) {
        return failure('VALIDATION_ERROR', 'Invalid e-mail address', {
          maxLength: limits.EMAIL_MAX_LENGTH,
        });
      }

      if (
        await limiter.isCooldownActive(EMAIL_NAMESPACES.globalCooldown, [userId])
      ) {
        return rateLimited(
          'scan_cooldown_active',
          limits.EMAIL_GLOBAL_COOLDOWN_SECONDS
        );
      }

      const duplicateKey = [userId, normalized];
      if (
        await limiter.isCooldownActive(EMAIL_NAMESPACES.duplicate, duplicateKey)
      ) {
        return rateLimited(
          'duplicate_scan',
          limits.EMAIL_DUPLICATE_SCAN_BLOCK_SECONDS
        );
      }

      const ipAllowed = await limiter.slidingWindowAllow(
        EMAIL_NAMESPACES.ipWindow,
        [ip],
        limits.EMAIL_RATE_WINDOW_SECONDS,
        limits.EMAIL_RATE_LIMIT_IP
      );
      if (!ipAllowed) {
        return rateLimited('ip_rate_limited', limits.EMAIL_RATE_WINDOW_SECONDS);
      }

      const userAllowed = await limiter.slidingWindowAllow(
        EMAIL_NAMESPACES.userWindow,
        [userId],
        limits.EMAIL_RATE_WINDOW_SECONDS,
        limits.EMAIL_RATE_LIMIT_USER
      );
      if (!userAllowed) {
        await limiter.acquireCooldown(
          EMAIL_NAMESPACES.globalCooldown,
          [userId],
          limits.EMAIL_GLOBAL_COOLDOWN_SECONDS
        );
        return rateLimited(
          'user_rate_limited',
          limits.EMAIL_GLOBAL_COOLDOWN_SECONDS
        );
      }

      // Claimed atomically: a concurrent identical scan can still lose here
      const firstScan = await limiter.acquireCooldown(
        EMAIL_NAMESPACES.duplicate,
        duplicateKey,
        limits.EMAIL_DUPLICATE_SCAN_BLOCK_SECONDS
      );
      if (!firstScan) {
        return rateLimited(
          'duplicate_scan',
          limits.EMAIL_DUPLICATE_SCAN_BLOCK_SECONDS
        );
      }

      return success({ email: normalized });
    },
  };
}
