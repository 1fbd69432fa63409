/**
 * Supabase Client Configuration
 * Admin client for the persistence adapters (memory records, audit logs)
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY from server-side adapters; never hand it to agents
 */
export function createSupabaseAdmin(
  url: string,
  serviceKey: string
): SupabaseClient {
  if (!url) {
    throw new Error('SUPABASE_URL is required');
  }
  if (!serviceKey) {
    throw new Error('SUPABASE_SERVICE_KEY is required for admin client');
  }
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
