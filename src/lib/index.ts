/**
 * Shared Library Exports
 * Clients, configuration and error types used across the application
 */

export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export {
  ConfigError,
  DuplicateEventError,
  InfrastructureUnavailableError,
  isInfrastructureUnavailable,
} from './errors.js';
export type { InfrastructureComponent } from './errors.js';
export { createRedisClient } from './redis.js';
export { createPool, toDatabaseError } from './postgres.js';
export type { SqlClient, SqlPool, SqlTransactionClient } from './postgres.js';
export {
  createSupabaseAdmin,
  createSupabaseTokenVerifier,
} from './supabase.js';
export type { TokenVerifier } from './supabase.js';
export { calendarBucket } from './calendar.js';
export type { CalendarBucket } from './calendar.js';
export { withTimeout } from './timeout.js';
