import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

/**
 * Builds the service-role client used by the session, section and memory stores.
 * Constructed once at startup and handed to each store.
 */
export function createSupabaseClient(config: AppConfig['supabase']): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
