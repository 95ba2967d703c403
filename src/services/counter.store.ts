/**
 * Atomic Counter Store
 * Implements CounterStore over the Upstash Redis REST client
 *
 * Each operation is one round trip: either a single command or a Lua script
 * that Redis runs atomically. There is no read-then-write on the client side.
 */

import { InfrastructureUnavailableError } from '../lib/errors.js';
import { withTimeout } from '../lib/timeout.js';

/**
 * Store primitives the rate-limit layer is built on. Policy-free.
 */
export interface CounterStore {
  /**
   * Increment `key`; set its expiry only on the first increment; admit when
   * the post-increment value is within `ceiling`.
   */
  consumeBucket(
    key: string,
    params: { ceiling: number; ttlSeconds: number }
  ): Promise<boolean>;

  /**
   * Prune members scored at or below `nowMs - windowMs`, then add `member`
   * only when fewer than `ceiling` remain.
   */
  admitToWindow(
    key: string,
    params: {
      nowMs: number;
      windowMs: number;
      ceiling: number;
      member: string;
      ttlSeconds: number;
    }
  ): Promise<boolean>;

  /** SET NX EX; true only for the caller that created the key */
  setIfAbsent(key: string, ttlSeconds: number): Promise<boolean>;

  exists(key: string): Promise<boolean>;
}

/**
 * The subset of the Upstash client this adapter calls
 */
export interface CounterStoreClient {
  eval(
    script: string,
    keys: string[],
    args: (string | number)[]
  ): Promise<unknown>;
  set(
    key: string,
    value: string,
    opts: { nx: true; ex: number }
  ): Promise<unknown>;
  exists(...keys: string[]): Promise<number>;
}

export const FIXED_BUCKET_SCRIPT = `
local current = redis.call('INCR', KEYS[1])
if current == 1 then
  redis.call('EXPIRE', KEYS[1], tonumber(ARGV[1]))
end
if current <= tonumber(ARGV[2]) then
  return 1
end
return 0
`;

export const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)

if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('EXPIRE', key, tonumber(ARGV[5]))
  return 1
end
return 0
`;

/**
 * Create CounterStore implementation using Upstash Redis.
 * Any client error or timeout becomes InfrastructureUnavailableError so that
 * callers fail closed.
 */
export function createUpstashCounterStore(
  client: CounterStoreClient,
  options: { timeoutMs: number }
): CounterStore {
  async function call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        operation(),
        options.timeoutMs,
        () => new Error(`Counter store call exceeded ${options.timeoutMs}ms`)
      );
    } catch (err) {
      throw new InfrastructureUnavailableError('counter_store', err);
    }
  }

  return {
    async consumeBucket(key, params): Promise<boolean> {
      const result = await call(() =>
        client.eval(FIXED_BUCKET_SCRIPT, [key], [
          params.ttlSeconds,
          params.ceiling,
        ])
      );
      return Number(result) === 1;
    },

    async admitToWindow(key, params): Promise<boolean> {
      const result = await call(() =>
        client.eval(SLIDING_WINDOW_SCRIPT, [key], [
          params.nowMs,
          params.windowMs,
          params.ceiling,
          params.member,
          params.ttlSeconds,
        ])
      );
      return Number(result) === 1;
    },

    async setIfAbsent(key, ttlSeconds): Promise<boolean> {
      const result = await call(() =>
        client.set(key, '1', { nx: true, ex: ttlSeconds })
      );
      return result === 'OK';
    },

    async exists(key): Promise<boolean> {
      const count = await call(() => client.exists(key));
      return count > 0;
    },
  };
}
