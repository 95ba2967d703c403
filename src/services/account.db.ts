/**
 * Account Database Adapter
 * Reads and conditionally updates subscription fields on the users table
 */

import { z } from 'zod';

import { toDatabaseError } from '../lib/postgres.js';
import type { SqlClient } from '../lib/postgres.js';
import { normalizePlan } from '../policy/plans.js';
import type { Account, LifetimeLimitKind } from '../types/index.js';
import { isSubscriptionStatus } from '../types/index.js';

/**
 * Database abstraction interface for the account services
 * Allows an in-memory fake in tests
 */
export interface AccountDb {
  getAccount(userId: string): Promise<Account | null>;

  /**
   * Single conditional increment. Returns the new value, or null when the
   * counter was already at the ceiling (zero rows affected).
   */
  incrementLifetimeUsage(
    userId: string,
    kind: LifetimeLimitKind,
    ceiling: number
  ): Promise<number | null>;

  /**
   * Rewrite an expired paid plan to FREE/EXPIRED, only while the stored
   * expiry still equals the one the caller observed. Returns the updated
   * account, or null when a concurrent write got there first.
   */
  downgradeExpiredPlan(
    userId: string,
    params: { expectedExpiresAt: Date; now: Date }
  ): Promise<Account | null>;
}

/**
 * Database row type. Kept as a type alias so it satisfies QueryResultRow.
 */
export type UserRow = {
  id: string;
  plan: string | null;
  subscription_status: string | null;
  subscription_expires_at: Date | null;
  last_subscription_event_at: Date | null;
  first_upgrade_used: boolean | null;
  ai_image_lifetime_used: number | null;
  created_at: Date | null;
};

export const ACCOUNT_COLUMNS = `id, plan, subscription_status, subscription_expires_at,
  last_subscription_event_at, first_upgrade_used, ai_image_lifetime_used, created_at`;

const LIFETIME_COLUMNS: Record<LifetimeLimitKind, string> = {
  AI_IMAGE_LIFETIME: 'ai_image_lifetime_used',
};

const userIdSchema = z.string().uuid();

/**
 * Map database row to Account entity
 */
export function mapRowToAccount(row: UserRow): Account {
  return {
    id: row.id,
    plan: normalizePlan(row.plan),
    subscriptionStatus: isSubscriptionStatus(row.subscription_status)
      ? row.subscription_status
      : 'ACTIVE',
    subscriptionExpiresAt: row.subscription_expires_at,
    lastSubscriptionEventAt: row.last_subscription_event_at,
    firstUpgradeUsed: row.first_upgrade_used ?? false,
    lifetimeUsage: {
      AI_IMAGE_LIFETIME: row.ai_image_lifetime_used ?? 0,
    },
    createdAt: row.created_at,
  };
}

/**
 * Create AccountDb implementation using pg
 */
export function createAccountDb(pool: SqlClient): AccountDb {
  return {
    async getAccount(userId: string): Promise<Account | null> {
      // A malformed id cannot match a row; skip the cast error from Postgres
      if (!userIdSchema.safeParse(userId).success) {
        return null;
      }
      try {
        const { rows } = await pool.query<UserRow>(
          `SELECT ${ACCOUNT_COLUMNS} FROM users WHERE id = $1`,
          [userId]
        );
        const row = rows[0];
        return row !== undefined ? mapRowToAccount(row) : null;
      } catch (err) {
        throw toDatabaseError(err);
      }
    },

    async incrementLifetimeUsage(
      userId: string,
      kind: LifetimeLimitKind,
      ceiling: number
    ): Promise<number | null> {
      const column = LIFETIME_COLUMNS[kind];
      try {
        const { rows } = await pool.query<{ used: number }>(
          `UPDATE users
              SET ${column} = ${column} + 1
            WHERE id = $1 AND ${column} < $2
        RETURNING ${column} AS used`,
          [userId, ceiling]
        );
        const row = rows[0];
        return row !== undefined ? row.used : null;
      } catch (err) {
        throw toDatabaseError(err);
      }
    },

    async downgradeExpiredPlan(
      userId: string,
      params: { expectedExpiresAt: Date; now: Date }
    ): Promise<Account | null> {
      try {
        // expectedExpiresAt came back through a JS Date (milliseconds); the column keeps microseconds
        const { rows } = await pool.query<UserRow>(
          `UPDATE users
              SET plan = 'FREE', subscription_status = 'EXPIRED'
            WHERE id = $1
              AND plan <> 'FREE'
              AND date_trunc('milliseconds', subscription_expires_at) = $2
              AND subscription_expires_at < $3
        RETURNING ${ACCOUNT_COLUMNS}`,
          [userId, params.expectedExpiresAt, params.now]
        );
        const row = rows[0];
        return row !== undefined ? mapRowToAccount(row) : null;
      } catch (err) {
        throw toDatabaseError(err);
      }
    },
  };
}
