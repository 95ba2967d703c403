/**
 * Upstash Redis Client Configuration
 * Backs the shared counter store used for quota and rate-limit keys
 */

import { Redis } from '@upstash/redis';

import type { AppConfig } from './config.js';

/**
 * Create the counter store client.
 * Retries are disabled: a quota check that cannot reach the store fails
 * closed right away instead of stalling the request.
 */
export function createRedisClient(
  config: Pick<AppConfig, 'UPSTASH_REDIS_URL' | 'UPSTASH_REDIS_TOKEN'>
): Redis {
  return new Redis({
    url: config.UPSTASH_REDIS_URL,
    token: config.UPSTASH_REDIS_TOKEN,
    retry: { retries: 0 },
    automaticDeserialization: false,
  });
}
