import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let serviceRoleClient: SupabaseClient | null = null;

/**
 * Server-side only. Used for cache reads and writes, bypasses RLS.
 * Returns null if the URL or SUPABASE_SERVICE_ROLE_KEY is not set; never falls back to an anon key.
 */
export function getSupabaseServiceRole(
  url: string | undefined = process.env.SUPABASE_URL,
  key: string | undefined = process.env.SUPABASE_SERVICE_ROLE_KEY
): SupabaseClient | null {
  if (!serviceRoleClient) {
    if (!url || !key) return null;
    serviceRoleClient = createClient(url, key, { auth: { persistSession: false } });
  }
  return serviceRoleClient;
}
