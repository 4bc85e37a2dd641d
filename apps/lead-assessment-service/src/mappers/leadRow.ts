import { z } from "zod";
import {
  Lead,
  LeadRow,
  LeadUpdate,
  LeadStats,
  LeadStatus,
  Assessment,
  Evidence,
  FactorKey,
  FactorValues,
  JsonObject,
  JsonValue,
  FACTOR_KEYS,
  isJsonObject,
} from "../types/lead";

/**
 * Maps between `leads` table rows and the Lead domain object.
 * The assessment lives under `raw_data.assessment`; other raw_data keys are carried through.
 */

const ASSESSMENT_KEY = "assessment";

const evidenceSchema = z.object({
  query: z.string().default(""),
  title: z.string().default(""),
  snippet: z.string().default(""),
  link: z.string().default(""),
});

const storedAssessmentSchema = z.object({
  lead_score: z.number(),
  rationales: z.record(z.string()).default({}),
  raw_search_snippets: z.record(z.array(evidenceSchema)).default({}),
  estimated_factors: z.array(z.enum(FACTOR_KEYS)).default([]),
});

// ============================================================================
// ROW -> LEAD
// ============================================================================

export function mapRowToLead(row: LeadRow): Lead {
  const rawData = normalizeRawData(row.raw_data);
  const { [ASSESSMENT_KEY]: storedAssessment, ...rest } = rawData;

  const status = toLeadStatus(row.status);
  const assessment = status === "assessed" ? parseStoredAssessment(storedAssessment) : null;
  if (status === "assessed" && !assessment) {
    console.warn(`[leadRow] Lead ${row.id} is assessed but its stored assessment is unreadable`);
  }

  return {
    id: row.id,
    company_name: row.company_name,
    industry: row.industry,
    description: row.description,
    source_url: row.source_url,
    company_size: row.company_size,
    search_query: row.search_query,
    lead_score: row.lead_score ?? 0,
    status,
    assessment,
    raw_data: rest,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Stored status as the API reports it: anything but "assessed" (null included) is "new".
 * Store filters and stats apply the same rule.
 */
export function toLeadStatus(status: string | null): LeadStatus {
  return status === "assessed" ? "assessed" : "new";
}

/**
 * Non-object raw_data (legacy text dumps) is kept under `raw`
 */
export function normalizeRawData(rawData: JsonValue | null): JsonObject {
  if (rawData === null) return {};
  if (isJsonObject(rawData)) return rawData;
  return { raw: rawData };
}

/**
 * Read a stored assessment payload; null when it is missing or malformed
 */
export function parseStoredAssessment(value: JsonValue | undefined): Assessment | null {
  if (!isJsonObject(value)) return null;

  const parsed = storedAssessmentSchema.safeParse(value);
  if (!parsed.success) return null;

  const values: FactorValues = {};
  const rationales: Partial<Record<FactorKey, string>> = {};
  const snippets: Partial<Record<FactorKey, Evidence[]>> = {};

  for (const factor of FACTOR_KEYS) {
    const factorValue = value[factor];
    if (factorValue !== undefined && factorValue !== null) {
      values[factor] = factorValue;
    }
    const rationale = parsed.data.rationales[factor];
    if (rationale !== undefined) {
      rationales[factor] = rationale;
    }
    const evidence = parsed.data.raw_search_snippets[factor];
    if (evidence !== undefined) {
      snippets[factor] = evidence;
    }
  }

  return {
    ...values,
    lead_score: parsed.data.lead_score,
    rationales,
    raw_search_snippets: snippets,
    estimated_factors: parsed.data.estimated_factors,
  };
}

// ============================================================================
// ASSESSMENT -> ROW
// ============================================================================

export function assessmentToJson(assessment: Assessment): JsonObject {
  const json: JsonObject = {};
  const rationales: JsonObject = {};
  const snippets: JsonObject = {};

  for (const factor of FACTOR_KEYS) {
    const value = assessment[factor];
    if (value !== undefined) {
      json[factor] = value;
    }
    const rationale = assessment.rationales[factor];
    if (rationale !== undefined) {
      rationales[factor] = rationale;
    }
    const evidence = assessment.raw_search_snippets[factor];
    if (evidence !== undefined) {
      snippets[factor] = evidence.map(e => ({ query: e.query, title: e.title, snippet: e.snippet, link: e.link }));
    }
  }

  json.lead_score = assessment.lead_score;
  json.rationales = rationales;
  json.raw_search_snippets = snippets;
  json.estimated_factors = [...assessment.estimated_factors];

  return json;
}

/**
 * Build the single update that marks a lead assessed.
 * `lead_score` is only written when the assessment's score is a finite number.
 */
export function buildAssessedUpdate(lead: Lead, assessment: Assessment, now: string): LeadUpdate {
  const update: LeadUpdate = {
    raw_data: { ...lead.raw_data, [ASSESSMENT_KEY]: assessmentToJson(assessment) },
    status: "assessed",
    updated_at: now,
  };

  if (Number.isFinite(assessment.lead_score)) {
    update.lead_score = assessment.lead_score;
  }

  return update;
}

// ============================================================================
// STATS
// ============================================================================

export function computeLeadStats(rows: Pick<LeadRow, "status" | "lead_score">[]): LeadStats {
  const assessed = rows.filter(r => toLeadStatus(r.status) === "assessed");

  return {
    total_leads: rows.length,
    assessed_leads: assessed.length,
    new_leads: rows.length - assessed.length,
    average_lead_score: averageLeadScore(assessed.map(r => r.lead_score)),
  };
}

/**
 * Mean of the finite scores, rounded to 2 decimals; 0 when there are none
 */
export function averageLeadScore(scores: (number | null)[]): number {
  const finite = scores.filter((s): s is number => typeof s === "number" && Number.isFinite(s));
  if (finite.length === 0) return 0;
  const average = finite.reduce((sum, s) => sum + s, 0) / finite.length;
  return Math.round(average * 100) / 100;
}
