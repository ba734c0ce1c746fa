import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getEnvironmentConfig } from './env.js';
import { getLogger } from './logger.js';

let supabaseClient: SupabaseClient | null = null;
let resolved = false;

/**
 * Returns the service-role client used for audit persistence, or null when
 * the deployment has no Supabase settings.
 */
export function getSupabaseClient(): SupabaseClient | null {
  if (resolved) {
    return supabaseClient;
  }

  const config = getEnvironmentConfig();
  const logger = getLogger();
  resolved = true;

  if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
    logger.warn('Supabase is not configured, audit records stay in memory');
    return null;
  }

  // Service role key: server-side writes only
  supabaseClient = createClient(
    config.SUPABASE_URL,
    config.SUPABASE_SERVICE_ROLE_KEY,
    {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    }
  );

  logger.info(
    { url: config.SUPABASE_URL },
    'Supabase client initialized successfully'
  );

  return supabaseClient;
}

export async function testSupabaseConnection(
  client: SupabaseClient
): Promise<boolean> {
  const logger = getLogger();
  const { error } = await client.from('order_audit_log').select('id').limit(1);

  if (error) {
    logger.error(
      { error: error.message, code: error.code },
      'Supabase connection test failed'
    );
    return false;
  }

  logger.info('Supabase connection test successful');
  return true;
}
