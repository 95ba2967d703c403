/**
 * Rate Limit Primitives
 *
 * Four reusable patterns over the counter store: calendar-bucket counters,
 * a sliding-window counter, a single-use cooldown lock and its existence
 * check. They know nothing about plans; callers pass namespaces and ceilings.
 *
 * Sliding window: the prune, count and insert run as one script, so two
 * callers cannot both see "ceiling - 1". Timestamps come from each
 * instance's own clock; under clock skew between instances a window may
 * admit one extra event. That is accepted in exchange for smooth
 * throttling without calendar alignment.
 */

import { createHash } from 'node:crypto';

import { nanoid } from 'nanoid';

import { calendarBucket } from '../lib/calendar.js';
import type { CalendarWindow } from '../types/index.js';

import type { CounterStore } from './counter.store.js';

export const KEY_PREFIX = 'quota';

/** Extra lifetime on a sliding-window set beyond its window */
const WINDOW_TTL_SLACK_SECONDS = 5;

export interface RateLimitPrimitives {
  fixedBucketIncrement(
    namespace: string,
    subject: readonly string[],
    window: CalendarWindow,
    ceiling: number
  ): Promise<boolean>;
  slidingWindowAllow(
    namespace: string,
    subject: readonly string[],
    windowSeconds: number,
    ceiling: number
  ): Promise<boolean>;
  acquireCooldown(
    namespace: string,
    subject: readonly string[],
    ttlSeconds: number
  ): Promise<boolean>;
  isCooldownActive(
    namespace: string,
    subject: readonly string[]
  ): Promise<boolean>;
}

/**
 * Derived cache key. Subject parts are hashed so raw identifiers (e-mail
 * addresses, IPs) never appear in the store.
 */
export function buildKey(namespace: string, parts: readonly string[]): string {
  const digest = createHash('sha256').update(parts.join('|')).digest('hex');
  return `${KEY_PREFIX}:${namespace}:${digest}`;
}

export function createRateLimitPrimitives(deps: {
  store: CounterStore;
  clock?: () => Date;
  generateId?: () => string;
}): RateLimitPrimitives {
  const { store } = deps;
  const clock = deps.clock ?? (() => new Date());
  const generateId = deps.generateId ?? (() => nanoid());

  return {
    async fixedBucketIncrement(namespace, subject, window, ceiling) {
      const { bucket, ttlSeconds } = calendarBucket(window, clock());
      return store.consumeBucket(buildKey(namespace, [...subject, bucket]), {
        ceiling,
        ttlSeconds,
      });
    },

    async slidingWindowAllow(namespace, subject, windowSeconds, ceiling) {
      const nowMs = clock().getTime();
      return store.admitToWindow(buildKey(namespace, subject), {
        nowMs,
        windowMs: windowSeconds * 1000,
        ceiling,
        // Two admits in the same millisecond must stay distinct members
        member: `${nowMs}:${generateId()}`,
        ttlSeconds: windowSeconds + WINDOW_TTL_SLACK_SECONDS,
      });
    },

    async acquireCooldown(namespace, subject, ttlSeconds) {
      return store.setIfAbsent(buildKey(namespace, subject), ttlSeconds);
    },

    async isCooldownActive(namespace, subject) {
      return store.exists(buildKey(namespace, subject));
    },
  };
}
