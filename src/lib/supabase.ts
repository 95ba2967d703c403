/**
 * Supabase Client Configuration
 * Identity (bearer token verification) and the audit log table
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Resolves a bearer token to the authenticated user id, or null
 */
export interface TokenVerifier {
  verify: (token: string) => Promise<{ userId: string } | null>;
}

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY for system operations that require elevated privileges
 */
export function createSupabaseAdmin(
  config: Pick<AppConfig, 'SUPABASE_URL' | 'SUPABASE_SERVICE_KEY'>
): SupabaseClient {
  return createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}

/**
 * Verify access tokens against Supabase Auth
 */
export function createSupabaseTokenVerifier(
  supabase: SupabaseClient
): TokenVerifier {
  return {
    async verify(token: string) {
      const {
        data: { user },
        error,
      } = await supabase.auth.getUser(token);

      if (error !== null || user === null) {
        return null;
      }
      return { userId: user.id };
    },
  };
}
