/**
 * AccountService Implementation
 *
 * Purpose: Load the caller's account with a non-stale plan.
 * Owns: users subscription fields (downgrade path only)
 * Dependencies: AuditService
 *
 * The billing provider's expiry callback can arrive late or never, so every
 * authenticated read recomputes the effective plan and persists a downgrade
 * when the stored plan has run past its expiry.
 */

import type { ActorContext, Account, PlanCode, Result } from '../types/index.js';
import { success, failure, SYSTEM_ACTOR } from '../types/index.js';

import type { AccountDb } from './account.db.js';
import type { AuditService } from './audit.service.js';

/**
 * AccountService interface
 */
export interface AccountService {
  loadAccount(actor: ActorContext, userId: string): Promise<Result<Account>>;
}

/**
 * Plan the account is entitled to right now. Expiry is compared as an
 * absolute instant, so the stored time zone does not matter.
 */
export function resolveEffectivePlan(
  account: Pick<Account, 'plan' | 'subscriptionExpiresAt'>,
  now: Date
): PlanCode {
  if (account.plan === 'FREE') {
    return 'FREE';
  }
  const expiresAt = account.subscriptionExpiresAt;
  if (expiresAt === null) {
    return account.plan;
  }
  return expiresAt.getTime() < now.getTime() ? 'FREE' : account.plan;
}

/**
 * Create AccountService instance
 */
export function createAccountService(deps: {
  db: AccountDb;
  auditService: AuditService;
  clock?: () => Date;
}): AccountService {
  const { db, auditService } = deps;
  const clock = deps.clock ?? (() => new Date());

  return {
    async loadAccount(
      actor: ActorContext,
      userId: string
    ): Promise<Result<Account>> {
      const account = await db.getAccount(userId);
      if (account === null) {
        return failure('NOT_FOUND', 'Account not found');
      }

      const now = clock();
      const expiresAt = account.subscriptionExpiresAt;
      if (
        resolveEffectivePlan(account, now) === account.plan ||
        expiresAt === null
      ) {
        return success(account);
      }

      const downgraded = await db.downgradeExpiredPlan(account.id, {
        expectedExpiresAt: expiresAt,
        now,
      });

      if (downgraded !== null) {
        // Self-healing write: recorded as the system, tied to the triggering request
        await auditService.log(
          { ...SYSTEM_ACTOR, requestId: actor.requestId },
          {
            action: 'SUBSCRIPTION_AUTO_DOWNGRADE',
            resourceType: 'user',
            resourceId: account.id,
            details: {
              previous_plan: account.plan,
              new_plan: 'FREE',
              subscription_expires_at: expiresAt.toISOString(),
            },
          }
        );
        return success(downgraded);
      }

      // A concurrent write (usually a renewal webhook) moved the row first
      const current = await db.getAccount(account.id);
      if (current === null) {
        return failure('NOT_FOUND', 'Account not found');
      }
      if (resolveEffectivePlan(current, now) === current.plan) {
        return success(current);
      }
      return success({
        ...current,
        plan: 'FREE',
        subscriptionStatus: 'EXPIRED',
      });
    },
  };
}
