/**
 * Supabase client for server-side use (service role, no session).
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
