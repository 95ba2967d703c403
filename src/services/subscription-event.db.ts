/**
 * Subscription Event Database Adapter
 * Ledger reads and the webhook transaction, using pg
 */

import type { SqlPool, SqlClient } from '../lib/postgres.js';
import { toDatabaseError } from '../lib/postgres.js';
import type {
  Account,
  LedgerEntry,
  LedgerStatus,
  NewLedgerEntry,
  SubscriptionUpdate,
} from '../types/index.js';

import { ACCOUNT_COLUMNS, mapRowToAccount } from './account.db.js';
import type { UserRow } from './account.db.js';

/**
 * Statements available inside the webhook transaction
 */
export interface SubscriptionEventTx {
  /** SELECT ... FOR UPDATE; the lock is held until commit or rollback */
  lockAccount(userId: string): Promise<Account | null>;
  /** False when the event id already exists in the ledger */
  insertEvent(entry: NewLedgerEntry): Promise<boolean>;
  setEventStatus(eventId: string, status: LedgerStatus): Promise<void>;
  applySubscription(userId: string, update: SubscriptionUpdate): Promise<Account>;
}

/**
 * Database abstraction interface for SubscriptionEventService
 */
export interface SubscriptionEventDb {
  findEvent(eventId: string): Promise<LedgerEntry | null>;
  /**
   * Run `work` in one transaction. Commits when it resolves, rolls back
   * when it throws.
   */
  transaction<T>(work: (tx: SubscriptionEventTx) => Promise<T>): Promise<T>;
}

type LedgerRow = {
  event_id: string;
  user_id: string | null;
  event_type: string;
  event_at: Date | null;
  processing_status: LedgerStatus;
  payload: string;
  created_at: Date;
};

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function mapRowToLedgerEntry(row: LedgerRow): LedgerEntry {
  return {
    eventId: row.event_id,
    userId: row.user_id,
    eventType: row.event_type,
    eventAt: row.event_at,
    processingStatus: row.processing_status,
    payload: row.payload,
    createdAt: row.created_at,
  };
}

function createTx(client: SqlClient): SubscriptionEventTx {
  return {
    async lockAccount(userId: string): Promise<Account | null> {
      if (!UUID_PATTERN.test(userId)) {
        return null;
      }
      const { rows } = await client.query<UserRow>(
        `SELECT ${ACCOUNT_COLUMNS} FROM users WHERE id = $1 FOR UPDATE`,
        [userId]
      );
      const row = rows[0];
      return row !== undefined ? mapRowToAccount(row) : null;
    },

    async insertEvent(entry: NewLedgerEntry): Promise<boolean> {
      const { rows } = await client.query<{ event_id: string }>(
        `INSERT INTO subscription_events
           (event_id, user_id, event_type, event_at, processing_status, payload)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (event_id) DO NOTHING
         RETURNING event_id`,
        [
          entry.eventId,
          entry.userId,
          entry.eventType,
          entry.eventAt,
          entry.processingStatus,
          entry.payload,
        ]
      );
      return rows.length > 0;
    },

    async setEventStatus(eventId: string, status: LedgerStatus): Promise<void> {
      await client.query(
        'UPDATE subscription_events SET processing_status = $2 WHERE event_id = $1',
        [eventId, status]
      );
    },

    async applySubscription(
      userId: string,
      update: SubscriptionUpdate
    ): Promise<Account> {
      const { rows } = await client.query<UserRow>(
        `UPDATE users
            SET plan = $2,
                subscription_status = $3,
                subscription_expires_at = $4,
                last_subscription_event_at = $5,
                first_upgrade_used = $6,
                updated_at = NOW()
          WHERE id = $1
      RETURNING ${ACCOUNT_COLUMNS}`,
        [
          userId,
          update.plan,
          update.subscriptionStatus,
          update.subscriptionExpiresAt,
          update.lastSubscriptionEventAt,
          update.firstUpgradeUsed,
        ]
      );
      const row = rows[0];
      if (row === undefined) {
        throw new Error(`Locked account disappeared: ${userId}`);
      }
      return mapRowToAccount(row);
    },
  };
}

/**
 * Create SubscriptionEventDb implementation using pg
 */
export function createSubscriptionEventDb(pool: SqlPool): SubscriptionEventDb {
  return {
    async findEvent(eventId: string): Promise<LedgerEntry | null> {
      try {
        const { rows } = await pool.query<LedgerRow>(
          `SELECT event_id, user_id, event_type, event_at, processing_status,
                  payload, created_at
             FROM subscription_events
            WHERE event_id = $1`,
          [eventId]
        );
        const row = rows[0];
        return row !== undefined ? mapRowToLedgerEntry(row) : null;
      } catch (err) {
        throw toDatabaseError(err);
      }
    },

    async transaction<T>(
      work: (tx: SubscriptionEventTx) => Promise<T>
    ): Promise<T> {
      const client = await pool.connect().catch((err: unknown) => {
        throw toDatabaseError(err);
      });

      try {
        await client.query('BEGIN');
        const result = await work(createTx(client));
        await client.query('COMMIT');
        client.release();
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
          client.release();
        } catch (rollbackErr) {
          // Broken connection: drop it from the pool instead of reusing it
          client.release(true);
          console.error('Rollback failed:', rollbackErr);
        }
        throw toDatabaseError(err);
      }
    },
  };
}
