import { EstimatePolicy, ESTIMATE_POLICIES } from "../types/lead";

/**
 * Environment configuration
 */
export const config = {
  port: parseInt(process.env.PORT || "3000", 10),

  // Supabase
  supabaseUrl: process.env.SUPABASE_URL || "",
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || "",

  // Serper web search
  serperApiKey: process.env.SERPER_API_KEY || "",
  searchTimeoutMs: parseInt(process.env.SEARCH_TIMEOUT_MS || "15000", 10),
  // Empty string disables the file cache
  searchCacheDir: process.env.SEARCH_CACHE_DIR ?? "cache/serper",

  // Anthropic completions
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  anthropicModel: process.env.ANTHROPIC_MODEL || "claude-3-5-haiku-latest",

  estimatePolicy: parseEstimatePolicy(process.env.ESTIMATE_POLICY),

  nodeEnv: process.env.NODE_ENV || "development"
};

/**
 * Unknown values fall back to "no_evidence"
 */
export function parseEstimatePolicy(raw: string | undefined): EstimatePolicy {
  const match = ESTIMATE_POLICIES.find(policy => policy === raw);
  if (raw && !match) {
    console.warn(`[config] Unknown ESTIMATE_POLICY "${raw}", using "no_evidence"`);
  }
  return match ?? "no_evidence";
}
