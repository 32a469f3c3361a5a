
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { InsightConfig } from './config';
import { InsightDataError } from './errors';

export type RowFetcher = (table: string) => Promise<Record<string, unknown>[]>;

// null when the URL or key is missing
export const createSupabaseClient = (config: InsightConfig): SupabaseClient | null => {
  const { url, anonKey } = config.supabase;
  if (!url || !anonKey) {
    console.warn('[Supabase] SUPABASE_URL / SUPABASE_ANON_KEY are not set. Supabase tables are unavailable.');
    return null;
  }
  return createClient(url, anonKey, { auth: { persistSession: false } });
};

export const createSupabaseRowFetcher = (client: SupabaseClient): RowFetcher => async (table: string) => {
  const { data, error } = await client.from(table).select('*');
  if (error) {
    console.error('[Supabase] Query failed:', { table, message: error.message, code: error.code });
    throw new InsightDataError('SourceUnavailable', `Could not read "${table}" from Supabase: ${error.message}`, {
      table,
      cause: error,
    });
  }
  return data ?? [];
};
