/**
 * QuotaService Implementation
 *
 * Purpose: Decide whether one more unit of a limit kind is allowed.
 * Dependencies: RateLimitPrimitives, LifetimeUsageGuard, AuditService
 *
 * Counter store and database failures are not caught here. They propagate
 * as InfrastructureUnavailableError and the request fails closed.
 */

import { LIMIT_DEFINITIONS, limitFor } from '../policy/plans.js';
import { buildUpgradeGuidance } from '../policy/upgrade.js';
import type {
  ActorContext,
  Account,
  LimitKind,
  QuotaExceededDetails,
  QuotaGrant,
  Result,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { AuditService } from './audit.service.js';
import type { LifetimeUsageGuard } from './lifetime-usage.service.js';
import type { RateLimitPrimitives } from './rate-limit.service.js';

export const COOLDOWN_NAMESPACE = 'plan-limit:cooldown';

const DEFAULT_COOLDOWN_SECONDS = 60;

/**
 * QuotaService interface
 */
export interface QuotaService {
  /**
   * `account` must already carry its effective plan (see AccountService).
   */
  enforce(
    actor: ActorContext,
    account: Account,
    kind: LimitKind,
    endpoint?: string
  ): Promise<Result<QuotaGrant>>;
  /** How long a denied (subject, limit kind) stays blocked */
  readonly cooldownSeconds: number;
}

/**
 * Create QuotaService instance
 */
export function createQuotaService(deps: {
  limiter: RateLimitPrimitives;
  lifetimeGuard: LifetimeUsageGuard;
  auditService: AuditService;
  cooldownSeconds?: number;
  clock?: () => Date;
}): QuotaService {
  const { limiter, lifetimeGuard, auditService } = deps;
  const cooldownSeconds = deps.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
  const clock = deps.clock ?? (() => new Date());

  return {
    cooldownSeconds,

    async enforce(
      actor: ActorContext,
      account: Account,
      kind: LimitKind,
      endpoint?: string
    ): Promise<Result<QuotaGrant>> {
      const ceiling = limitFor(account.plan, kind);
      if (ceiling === null) {
        return success({ limit_type: kind, limit: null });
      }

      const definition = LIMIT_DEFINITIONS[kind];
      const cooldownSubject = [account.id, definition.feature];

      const denial = (
        reason: QuotaExceededDetails['reason']
      ): Result<QuotaGrant> => {
        const details: QuotaExceededDetails = {
          plan: account.plan,
          limit_type: kind,
          window: definition.window,
          limit: ceiling,
          reason,
          upgrade: buildUpgradeGuidance(account, definition.feature, clock()),
        };
        return failure('PLAN_LIMIT_EXCEEDED', 'Plan usage limit reached', details);
      };

      if (await limiter.isCooldownActive(COOLDOWN_NAMESPACE, cooldownSubject)) {
        return denial('limit_cooldown_active');
      }

      const allowed =
        definition.window === 'lifetime'
          ? await lifetimeGuard.consume(account, definition.counter, ceiling)
          : await limiter.fixedBucketIncrement(
              definition.namespace,
              [account.id],
              definition.window,
              ceiling
            );

      if (allowed) {
        return success({ limit_type: kind, limit: ceiling });
      }

      await limiter.acquireCooldown(
        COOLDOWN_NAMESPACE,
        cooldownSubject,
        cooldownSeconds
      );

      await auditService.log(actor, {
        action: 'PLAN_LIMIT_EXCEEDED',
        resourceType: 'user',
        resourceId: account.id,
        details: {
          plan: account.plan,
          limit_type: kind,
          limit: ceiling,
          window: definition.window,
          endpoint: endpoint ?? null,
        },
      });

      return denial('plan_limit_exceeded');
    },
  };
}
