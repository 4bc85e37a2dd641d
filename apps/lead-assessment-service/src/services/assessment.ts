import {
  Lead,
  FactorKey,
  FactorResult,
  FactorValues,
  Evidence,
  Assessment,
  AssessmentOutcome,
  JsonValue,
  FACTOR_KEYS,
  SCORE_FACTOR_KEYS,
} from "../types/lead";
import { Result } from "../types/result";
import { FactorFailure } from "./factorEstimator";
import { AggregateFailure, errorMessage } from "./errors";

/**
 * Anything that can estimate one factor for one lead (FactorEstimator in production)
 */
export interface FactorEstimating {
  estimate(lead: Lead, factor: FactorKey): Promise<Result<FactorResult, FactorFailure>>;
}

// ============================================================================
// NORMALIZATION
// ============================================================================

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Best-effort numeric coercion of a model-provided score.
 * Returns null for anything that is not clearly a number.
 */
export function coerceScore(value: JsonValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    // Decimal notation only: no hex, binary or octal literals
    if (!DECIMAL_PATTERN.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function clampUnit(score: number): number {
  return Math.min(1, Math.max(0, score));
}

/**
 * Clamp every coercible score-type factor into [0, 1] in place and return the clamped scores.
 * Non-numeric values are left untouched and excluded from the result.
 */
export function normalizeScoreFactors(values: FactorValues): number[] {
  const scores: number[] = [];

  for (const factor of SCORE_FACTOR_KEYS) {
    const raw = values[factor];
    if (raw === undefined || raw === null) continue;

    const coerced = coerceScore(raw);
    if (coerced === null) {
      console.warn(`[assessment] Non-numeric value for ${factor}, excluded from lead score:`, raw);
      continue;
    }

    const clamped = clampUnit(coerced);
    values[factor] = clamped;
    scores.push(clamped);
  }

  return scores;
}

/**
 * Mean of the normalized scores on a 0-100 scale; 0 when there are none
 */
export function computeLeadScore(scores: number[]): number {
  if (scores.length === 0) return 0;
  const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  return Math.round(mean * 100);
}

// ============================================================================
// AGGREGATOR
// ============================================================================

/**
 * Runs every factor for a lead and folds the results into one Assessment.
 *
 * Per-factor failures are logged and skipped. The estimator may be given as a factory
 * so that provider construction errors surface as `{ error }` rather than a throw.
 */
export class AssessmentAggregator {
  constructor(private readonly estimator: FactorEstimating | (() => FactorEstimating)) {}

  async assess(lead: Lead): Promise<AssessmentOutcome> {
    try {
      const estimator = typeof this.estimator === "function" ? this.estimator() : this.estimator;

      console.log(`[assessment] Assessing lead ${lead.id}: ${lead.company_name}`);

      const values: FactorValues = {};
      const rationales: Partial<Record<FactorKey, string>> = {};
      const rawSearchSnippets: Partial<Record<FactorKey, Evidence[]>> = {};
      const estimatedFactors: FactorKey[] = [];
      let modelLeadScore: number | undefined;

      for (const factor of FACTOR_KEYS) {
        const result = await estimator.estimate(lead, factor);

        if (!result.ok) {
          rawSearchSnippets[factor] = result.error.evidence;
          console.warn(`[assessment] Skipping ${factor} (${result.error.error.kind}): ${result.error.error.message}`);
          continue;
        }

        const factorResult = result.value;
        rawSearchSnippets[factor] = factorResult.evidence;

        if (factorResult.value !== undefined) {
          values[factor] = factorResult.value;
          if (factorResult.estimated) {
            estimatedFactors.push(factor);
          }
        }

        if (factorResult.rationale) {
          rationales[factor] = factorResult.rationale;
        }

        if (modelLeadScore === undefined && factorResult.leadScore !== undefined) {
          modelLeadScore = factorResult.leadScore;
        }
      }

      const scores = normalizeScoreFactors(values);

      const assessment: Assessment = {
        ...values,
        // A model-supplied overall score is kept verbatim, range included
        lead_score: modelLeadScore ?? computeLeadScore(scores),
        rationales,
        raw_search_snippets: rawSearchSnippets,
        estimated_factors: estimatedFactors,
      };

      console.log(`[assessment] Lead ${lead.id} assessed:`, {
        factors: Object.keys(values).length,
        scores: scores.length,
        lead_score: assessment.lead_score,
      });

      return assessment;
    } catch (error) {
      const failure = new AggregateFailure(errorMessage(error), { cause: error });
      console.error(`[assessment] Failed to assess lead ${lead.id} (${lead.company_name}):`, failure.message);
      return { error: failure.message };
    }
  }
}
