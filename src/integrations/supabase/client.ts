import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Service-role client for table storage and log inserts.
 * Server-side only; sessions are not persisted.
 */
export function createServiceClient(url: string, serviceKey: string): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
