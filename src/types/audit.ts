/**
 * Audit Types
 */

/**
 * Audit actions written by the quota and subscription subsystems
 */
export type AuditAction =
  | 'PLAN_LIMIT_EXCEEDED'
  | 'UPGRADE_REQUIRED'
  | 'SUBSCRIPTION_WEBHOOK_EVENT'
  | 'SUBSCRIPTION_UPDATED'
  | 'SUBSCRIPTION_EVENT_IGNORED'
  | 'SUBSCRIPTION_AUTO_DOWNGRADE';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: AuditAction;
  resourceType: string; // e.g. 'user', 'subscription_event'
  resourceId?: string | null;
  details?: Record<string, unknown>;
}
