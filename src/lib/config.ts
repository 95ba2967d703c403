/**
 * Environment Configuration
 * Validated once at startup; a missing connection string or webhook secret
 * stops the process instead of failing individual requests.
 */

import { z } from 'zod';

import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),

  // Counter store
  UPSTASH_REDIS_URL: z.string().url(),
  UPSTASH_REDIS_TOKEN: z.string().min(1),
  COUNTER_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

  // Relational store
  DATABASE_URL: z.string().min(1),
  DATABASE_STATEMENT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000),

  // Identity provider and audit sink
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  // Billing provider
  REVENUECAT_WEBHOOK_SECRET: z.string().min(1),

  QUOTA_COOLDOWN_SECONDS: z.coerce.number().int().positive().default(60),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== '')
    ),
  TRUST_PROXY_HEADERS: booleanFlag.default('true'),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  // Treat empty strings as unset so `FOO=` in a .env file is reported missing
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
