/**
 * Database module exports
 */

import { getSupabase } from "./supabase";
import { SupabaseLeadStore } from "./leads";
import { InMemoryLeadStore } from "./client";
import { LeadStore } from "./store";

export { getSupabase, isSupabaseConfigured } from "./supabase";
export { SupabaseLeadStore } from "./leads";
export { InMemoryLeadStore } from "./client";
export type { LeadStore } from "./store";

/**
 * Supabase-backed store when configured, otherwise in-memory
 */
export function createLeadStore(): LeadStore {
  const supabase = getSupabase();

  if (!supabase) {
    console.warn("[db] Supabase not configured, using in-memory lead store");
    return new InMemoryLeadStore();
  }

  return new SupabaseLeadStore(supabase);
}
