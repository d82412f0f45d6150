import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../config';

type SupabaseSettings = Pick<AppConfig, 'supabaseUrl' | 'supabaseKey'>;

export interface SupabaseClientOptions {
  /** Replaces the global fetch for every REST call the client makes. */
  fetch?: typeof fetch;
}

export function isSupabaseConfigured(config: SupabaseSettings): boolean {
  return config.supabaseUrl.length > 0 && config.supabaseKey.length > 0;
}

export function createSupabaseClient(
  config: SupabaseSettings,
  options: SupabaseClientOptions = {},
): SupabaseClient {
  if (!isSupabaseConfigured(config)) {
    throw new Error(
      'Supabase client is not initialised. Ensure SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY) are set.',
    );
  }

  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}
