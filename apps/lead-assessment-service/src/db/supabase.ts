import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { config } from "../config";

let supabaseInstance: SupabaseClient | null = null;

/**
 * Get Supabase client singleton
 * Returns null if credentials not configured
 */
export function getSupabase(): SupabaseClient | null {
  if (!isSupabaseConfigured()) {
    return null;
  }

  if (!supabaseInstance) {
    supabaseInstance = createClient(config.supabaseUrl, config.supabaseServiceKey, {
      auth: { persistSession: false }
    });
  }

  return supabaseInstance;
}

/**
 * Leads are kept in Supabase only when both URL and service key are set
 */
export function isSupabaseConfigured(): boolean {
  return !!(config.supabaseUrl && config.supabaseServiceKey);
}

/**
 * PostgREST code for "no rows" on .single()
 */
export const NOT_FOUND_CODE = "PGRST116";

/**
 * PostgREST code for a range that starts past the last row
 */
export const RANGE_NOT_SATISFIABLE_CODE = "PGRST103";
