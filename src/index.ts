/**
 * Application Entry Point
 *
 * Validates configuration, wires clients and services, and starts the Hono
 * application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { loadConfig } from './lib/config.js';
import type { AppConfig } from './lib/config.js';
import { ConfigError } from './lib/errors.js';
import { createPool } from './lib/postgres.js';
import { createRedisClient } from './lib/redis.js';
import {
  createSupabaseAdmin,
  createSupabaseTokenVerifier,
} from './lib/supabase.js';
import {
  createAccountDb,
  createAccountService,
  createAuditService,
  createAuditServiceDb,
  createEmailScanGuard,
  createLifetimeUsageGuard,
  createQuotaService,
  createRateLimitPrimitives,
  createSubscriptionEventDb,
  createSubscriptionEventService,
  createUpstashCounterStore,
} from './services/index.js';

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('Invalid configuration:');
      for (const issue of err.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

// Clients
const supabase = createSupabaseAdmin(config);
const pool = createPool(config);
const redis = createRedisClient(config);

// Adapters
const counterStore = createUpstashCounterStore(redis, {
  timeoutMs: config.COUNTER_STORE_TIMEOUT_MS,
});
const auditDb = createAuditServiceDb(supabase);
const accountDb = createAccountDb(pool);
const subscriptionEventDb = createSubscriptionEventDb(pool);

// Services
const auditService = createAuditService({ db: auditDb });
const limiter = createRateLimitPrimitives({ store: counterStore });

const accountService = createAccountService({ db: accountDb, auditService });

const quotaService = createQuotaService({
  limiter,
  lifetimeGuard: createLifetimeUsageGuard({ db: accountDb }),
  auditService,
  cooldownSeconds: config.QUOTA_COOLDOWN_SECONDS,
});

const subscriptionEventService = createSubscriptionEventService({
  db: subscriptionEventDb,
  auditService,
  webhookSecret: config.REVENUECAT_WEBHOOK_SECRET,
});

const emailScanGuard = createEmailScanGuard({ limiter });

const app = createApp({
  services: {
    accountService,
    auditService,
    quotaService,
    subscriptionEventService,
    emailScanGuard,
  },
  tokenVerifier: createSupabaseTokenVerifier(supabase),
  limiter,
  allowedOrigins: config.ALLOWED_ORIGINS,
  trustProxyHeaders: config.TRUST_PROXY_HEADERS,
});

console.error(`Server starting on port ${config.PORT}`);

serve({
  fetch: app.fetch,
  port: config.PORT,
});

export { app };
