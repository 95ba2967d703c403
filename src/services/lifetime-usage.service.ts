/**
 * Lifetime Counter Guard
 *
 * Limits that must never reset live on the account row, not in the cache.
 * The database enforces the ceiling in a single conditional update.
 */

import type { Account, LifetimeLimitKind } from '../types/index.js';

import type { AccountDb } from './account.db.js';

export interface LifetimeUsageGuard {
  /**
   * Consume one unit. On success the in-memory account is updated so the
   * rest of the request sees the new counter.
   */
  consume(
    account: Account,
    kind: LifetimeLimitKind,
    ceiling: number
  ): Promise<boolean>;
}

export function createLifetimeUsageGuard(deps: {
  db: AccountDb;
}): LifetimeUsageGuard {
  const { db } = deps;

  return {
    async consume(account, kind, ceiling): Promise<boolean> {
      const used = await db.incrementLifetimeUsage(account.id, kind, ceiling);
      if (used === null) {
        return false;
      }
      account.lifetimeUsage[kind] = used;
      return true;
    },
  };
}
