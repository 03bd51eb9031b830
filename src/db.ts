/**
 * Supabase client factory.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigError } from './errors.js';

export function getSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  if (!url || !serviceRoleKey) {
    throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
  }
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false },
  });
}
