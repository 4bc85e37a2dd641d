import {
  Lead,
  FactorKey,
  FactorResult,
  Evidence,
  EstimatePolicy,
  JsonValue,
  isJsonObject,
  isScoreFactor,
} from "../types/lead";
import { Result, ok, err } from "../types/result";
import { SearchProvider } from "../providers/search";
import { CompletionProvider } from "../providers/completion";
import { buildFactorQuery } from "./factorQuery";
import { generateJson } from "./jsonRepair";
import { FactorError } from "./errors";

export const SEARCH_RESULTS_PER_FACTOR = 3;
const EVIDENCE_MAX_TOKENS = 800;
const ESTIMATE_MAX_TOKENS = 600;

/**
 * Keys consulted, in priority order, for a factor's value in the model's JSON object.
 * The first one holding a non-null value wins.
 */
export function factorValueKeys(factor: FactorKey): string[] {
  return [factor, "value", "score", "result"];
}

// ============================================================================
// ALLOWED VALUES
// ============================================================================

const CATEGORICAL_RULES: Partial<Record<FactorKey, string>> = {
  tech_stack: "one of 'Shopify', 'WooCommerce', 'WordPress', 'Custom', or 'Unknown'",
  business_age_months: "an integer number of months since the business started",
  merchant_category: "one of 'Subscription', 'Services', 'E-commerce', 'SaaS', or 'Other'",
  company_scale: "one of 'SMB', 'Medium', or 'Enterprise'",
};

function allowedValueRule(factor: FactorKey): string {
  if (isScoreFactor(factor)) {
    return "a float between 0 and 1";
  }
  return CATEGORICAL_RULES[factor] ?? "one of the allowed categories";
}

// ============================================================================
// PROMPTS
// ============================================================================

export type PromptVariant = "evidence" | "estimate";

function leadContext(lead: Lead, evidence: Evidence[]): string {
  const leadInfo = {
    company_name: lead.company_name,
    source_url: lead.source_url,
    industry: lead.industry,
  };
  return `LEAD:\n${JSON.stringify(leadInfo)}\n\nSEARCH_SNIPPETS:\n${JSON.stringify(evidence)}\n`;
}

export function buildFactorPrompt(lead: Lead, factor: FactorKey, evidence: Evidence[]): string {
  return (
    "You are an assistant that inspects web search results and extracts one field for a company.\n" +
    `Field: ${factor}\n` +
    `Allowed output: Return a single JSON object with keys: "${factor}" and optional "rationale".\n` +
    `The value of "${factor}" must be ${allowedValueRule(factor)}.\n` +
    "Return ONLY valid JSON (no markdown, no code fences).\n\n" +
    leadContext(lead, evidence)
  );
}

export function buildEstimatePrompt(lead: Lead, factor: FactorKey, evidence: Evidence[]): string {
  return (
    "You did not find explicit evidence in the provided snippets. Using the lead information and the snippets, " +
    `provide a best-effort ESTIMATE for the field \`${factor}\` for the company.\n` +
    `Return a JSON object with keys: "${factor}" (value), optional "rationale" explaining why, and "estimated": true.\n` +
    `The value of "${factor}" must be ${allowedValueRule(factor)}.\n` +
    "Return ONLY valid JSON (no markdown, no code fences).\n\n" +
    leadContext(lead, evidence)
  );
}

// ============================================================================
// VALUE EXTRACTION
// ============================================================================

export interface ExtractedFactor {
  value?: JsonValue;
  rationale?: string;
  leadScore?: number;
}

/**
 * Pull the factor's value, rationale and any volunteered lead_score out of parsed model output.
 * An array answer is read through its first element when that element is an object.
 */
export function extractFactorValue(parsed: JsonValue, factor: FactorKey): ExtractedFactor {
  const candidate = Array.isArray(parsed) ? parsed[0] : parsed;
  if (!isJsonObject(candidate)) {
    return {};
  }

  const extracted: ExtractedFactor = {};

  for (const key of factorValueKeys(factor)) {
    const value = candidate[key];
    if (value !== undefined && value !== null) {
      extracted.value = value;
      break;
    }
  }

  const rationale = candidate.rationale;
  if (typeof rationale === "string" && rationale) {
    extracted.rationale = rationale;
  }

  const leadScore = candidate.lead_score;
  if (typeof leadScore === "number" && Number.isFinite(leadScore)) {
    extracted.leadScore = leadScore;
  }

  return extracted;
}

// ============================================================================
// ESTIMATOR
// ============================================================================

/**
 * A factor that could not be estimated; the evidence gathered so far is kept for auditing
 */
export interface FactorFailure {
  factor: FactorKey;
  evidence: Evidence[];
  error: FactorError;
}

export interface FactorEstimatorOptions {
  search: SearchProvider;
  completion: CompletionProvider;
  estimatePolicy?: EstimatePolicy;
  resultsPerFactor?: number;
}

/**
 * Runs search + LLM extraction for a single factor
 */
export class FactorEstimator {
  private readonly search: SearchProvider;
  private readonly completion: CompletionProvider;
  private readonly estimatePolicy: EstimatePolicy;
  private readonly resultsPerFactor: number;

  constructor(options: FactorEstimatorOptions) {
    this.search = options.search;
    this.completion = options.completion;
    this.estimatePolicy = options.estimatePolicy ?? "no_evidence";
    this.resultsPerFactor = options.resultsPerFactor ?? SEARCH_RESULTS_PER_FACTOR;
  }

  async estimate(lead: Lead, factor: FactorKey): Promise<Result<FactorResult, FactorFailure>> {
    const evidence = await this.gatherEvidence(lead, factor);

    if (this.estimatePolicy !== "never" && evidence.length === 0) {
      return this.runPrompt(lead, factor, evidence, "estimate");
    }

    const primary = await this.runPrompt(lead, factor, evidence, "evidence");

    if (this.estimatePolicy === "no_value" && (!primary.ok || primary.value.value === undefined)) {
      console.log(`[estimator] ${factor}: no value from evidence, falling back to estimate`);
      const fallback = await this.runPrompt(lead, factor, evidence, "estimate");
      return fallback.ok || !primary.ok ? fallback : primary;
    }

    return primary;
  }

  private async gatherEvidence(lead: Lead, factor: FactorKey): Promise<Evidence[]> {
    const query = buildFactorQuery(lead.company_name, lead.industry, lead.source_url, factor);
    // A search failure never fails the factor
    try {
      return await this.search.search(query, this.resultsPerFactor);
    } catch (error) {
      console.warn(`[estimator] Search threw for ${factor}, continuing without evidence:`, error);
      return [];
    }
  }

  private async runPrompt(
    lead: Lead,
    factor: FactorKey,
    evidence: Evidence[],
    variant: PromptVariant
  ): Promise<Result<FactorResult, FactorFailure>> {
    const estimated = variant === "estimate";
    const prompt = estimated
      ? buildEstimatePrompt(lead, factor, evidence)
      : buildFactorPrompt(lead, factor, evidence);

    const parsed = await generateJson(this.completion, prompt, {
      maxTokens: estimated ? ESTIMATE_MAX_TOKENS : EVIDENCE_MAX_TOKENS,
      schemaHint: `a single JSON object {"${factor}": <${allowedValueRule(factor)}>, "rationale": <string>}`,
    });

    if (!parsed.ok) {
      return err({ factor, evidence, error: parsed.error });
    }

    const extracted = extractFactorValue(parsed.value, factor);
    const result: FactorResult = { factor, evidence, ...extracted };
    if (estimated) {
      result.estimated = true;
    }
    return ok(result);
  }
}
