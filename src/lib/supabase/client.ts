import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { SupabaseCredentials } from '@/src/lib/recipe-sync/recipeSync.config';

export type CreateSupabaseClientOptions = {
  /** Replaces the global fetch (tests, custom agents) */
  fetch?: typeof fetch;
};

/**
 * Supabase client for the recipe sync engine.
 * No session persistence: the process runs as one configured user.
 */
export function createSupabaseClient(
  credentials: Pick<SupabaseCredentials, 'url' | 'anonKey'>,
  options: CreateSupabaseClientOptions = {},
): SupabaseClient {
  return createClient(credentials.url, credentials.anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
    ...(options.fetch && { global: { fetch: options.fetch } }),
  });
}
