/**
 * Actor Types
 */

/**
 * Actor Context - who is performing the action
 * Every service method that writes audit entries receives this context
 */
export interface ActorContext {
  type: 'user' | 'system' | 'webhook' | 'anonymous';
  userId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for background jobs and self-healing writes
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};
