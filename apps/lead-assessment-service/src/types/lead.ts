/**
 * Lead Assessment Types
 * Matches the Supabase/Postgres `leads` table
 */

// ============================================================================
// ENUMS
// ============================================================================

export type LeadStatus = "new" | "assessed";

export const LEAD_STATUSES = ["new", "assessed"] as const satisfies readonly LeadStatus[];

/**
 * Assessment dimensions, in the order they are evaluated
 */
export const FACTOR_KEYS = [
  "tech_stack",
  "business_age_months",
  "merchant_category",
  "company_scale",
  "integration_readiness_score",
  "transaction_intent_score",
  "digital_maturity_score",
  "web_presence_quality",
  "fraud_risk_pattern_score",
  "traffic_check",
  "brand_search_volume",
] as const;

export type FactorKey = (typeof FACTOR_KEYS)[number];

/**
 * Factors whose value is a float in [0, 1] and feeds the overall lead score
 */
export const SCORE_FACTOR_KEYS = [
  "integration_readiness_score",
  "transaction_intent_score",
  "digital_maturity_score",
  "web_presence_quality",
  "fraud_risk_pattern_score",
  "traffic_check",
  "brand_search_volume",
] as const satisfies readonly FactorKey[];

export type ScoreFactorKey = (typeof SCORE_FACTOR_KEYS)[number];

/**
 * When the best-effort "estimate" prompt is used instead of (or after) the evidence prompt
 * - never: evidence prompt only
 * - no_evidence: estimate prompt when the search returned nothing
 * - no_value: as no_evidence, plus a second try when the evidence prompt yields no value
 */
export type EstimatePolicy = "never" | "no_evidence" | "no_value";

export const ESTIMATE_POLICIES = ["never", "no_evidence", "no_value"] as const satisfies readonly EstimatePolicy[];

export function isFactorKey(value: string): value is FactorKey {
  return FACTOR_KEYS.some(key => key === value);
}

export function isScoreFactor(factor: FactorKey): factor is ScoreFactorKey {
  return SCORE_FACTOR_KEYS.some(key => key === factor);
}

// ============================================================================
// JSON VALUES (model output)
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// DATABASE RECORD TYPES
// ============================================================================

/**
 * Row shape of the `leads` table
 */
export interface LeadRow {
  id: number;
  company_name: string;
  industry: string | null;
  description: string | null;
  source_url: string | null;
  company_size: string | null;
  search_query: string | null;
  lead_score: number | null;
  status: string | null;
  raw_data: JsonValue | null;
  created_at: string;
  updated_at: string;
}

export type LeadInsert = Omit<LeadRow, "id" | "created_at" | "updated_at"> & {
  id?: number;
  created_at?: string;
  updated_at?: string;
};

export type LeadUpdate = Partial<Omit<LeadRow, "id" | "created_at">>;

/**
 * Lead as the assessment pipeline sees it
 */
export interface Lead {
  id: number;
  company_name: string;
  industry: string | null;
  description: string | null;
  source_url: string | null;
  company_size: string | null;
  search_query: string | null;
  lead_score: number;
  status: LeadStatus;
  /** Null until assessed, or when the stored payload cannot be read */
  assessment: Assessment | null;
  /** Everything else stored alongside the assessment in raw_data */
  raw_data: JsonObject;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// ASSESSMENT TYPES
// ============================================================================

/**
 * A search result used as grounding for one factor
 */
export interface Evidence {
  query: string;
  title: string;
  snippet: string;
  link: string;
}

export interface FactorResult {
  factor: FactorKey;
  /** Absent when the model returned none of the candidate keys */
  value?: JsonValue;
  rationale?: string;
  /** True when the value came from the best-effort estimate prompt */
  estimated?: boolean;
  /** Overall score the model volunteered alongside the factor, kept verbatim */
  leadScore?: number;
  evidence: Evidence[];
}

export type FactorValues = Partial<Record<FactorKey, JsonValue>>;

export type Assessment = FactorValues & {
  lead_score: number;
  rationales: Partial<Record<FactorKey, string>>;
  raw_search_snippets: Partial<Record<FactorKey, Evidence[]>>;
  estimated_factors: FactorKey[];
};

/**
 * Returned instead of an Assessment when the pipeline itself blew up
 */
export interface AssessmentFailure {
  error: string;
}

export type AssessmentOutcome = Assessment | AssessmentFailure;

export function isAssessmentFailure(outcome: AssessmentOutcome): outcome is AssessmentFailure {
  return "error" in outcome && typeof outcome.error === "string";
}

// ============================================================================
// API TYPES
// ============================================================================

export interface LeadAssessmentEntry {
  leadId: number;
  companyName: string;
  assessment: AssessmentOutcome;
}

export interface LeadStats {
  total_leads: number;
  assessed_leads: number;
  new_leads: number;
  average_lead_score: number;
}

export interface ListLeadsOptions {
  status?: LeadStatus;
  limit: number;
  offset: number;
}

export interface LeadPage {
  total: number;
  leads: Lead[];
}
