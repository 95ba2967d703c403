/**
 * AuditService Implementation
 *
 * Purpose: Append-only audit trail for quota denials and subscription changes.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type { ActorContext, AuditEvent, Result } from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Row written to audit_logs
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: string;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
}

function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: actor.ip ?? null,
    userAgent: actor.userAgent ?? null,
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch (err) {
        console.error(`Audit write failed (${event.action}):`, err);
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },
  };
}
