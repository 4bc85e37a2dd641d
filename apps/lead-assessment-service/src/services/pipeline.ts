import { config as defaultConfig } from "../config";
import { LeadStore } from "../db/store";
import { SearchProvider, SerperSearchProvider, CachedSearchProvider } from "../providers/search";
import { AnthropicCompletionProvider } from "../providers/completion";
import { FactorEstimator } from "./factorEstimator";
import { AssessmentAggregator } from "./assessment";
import { LeadAssessmentService } from "./leadAssessment";

export type PipelineConfig = Pick<
  typeof defaultConfig,
  "serperApiKey" | "searchTimeoutMs" | "searchCacheDir" | "anthropicApiKey" | "anthropicModel" | "estimatePolicy"
>;

export function createSearchProvider(cfg: PipelineConfig): SearchProvider {
  const serper = new SerperSearchProvider({ apiKey: cfg.serperApiKey, timeoutMs: cfg.searchTimeoutMs });
  return cfg.searchCacheDir ? new CachedSearchProvider(serper, cfg.searchCacheDir) : serper;
}

/**
 * Wire Serper + Anthropic into a LeadAssessmentService.
 * The completion client is built on first use, so a missing API key shows up
 * as an `{ error }` assessment instead of a startup crash.
 */
export function createLeadAssessmentService(
  store: LeadStore,
  cfg: PipelineConfig = defaultConfig
): LeadAssessmentService {
  const search = createSearchProvider(cfg);
  let estimator: FactorEstimator | null = null;

  const aggregator = new AssessmentAggregator(() => {
    if (!estimator) {
      estimator = new FactorEstimator({
        search,
        completion: new AnthropicCompletionProvider({ apiKey: cfg.anthropicApiKey, model: cfg.anthropicModel }),
        estimatePolicy: cfg.estimatePolicy,
      });
    }
    return estimator;
  });

  return new LeadAssessmentService(aggregator, store);
}
