import { FactorKey, isFactorKey } from "../types/lead";

const MAX_KEYWORDS = 6;

// ============================================================================
// CURATED KEYWORDS PER FACTOR
// Only the first MAX_KEYWORDS of each list make it into the query
// ============================================================================

export const FACTOR_KEYWORDS: Record<FactorKey, string[]> = {
  tech_stack: ["built on", "powered by", "Shopify", "WooCommerce", "WordPress", "Magento", "bigcommerce", "platform"],
  business_age_months: ["founded", "established", "since", "founded in", "incorporated", "year"],
  merchant_category: ["subscription", "SaaS", "services", "e-commerce", "online store", "marketplace"],
  company_scale: ["employees", "team of", "headcount", "startup", "enterprise", "SMB", "small business"],
  integration_readiness_score: ["API", "integrations", "developer docs", "plugins", "extensions", "Zapier", "webhooks"],
  transaction_intent_score: ["checkout", "buy now", "pricing", "add to cart", "purchase", "orders", "payment"],
  digital_maturity_score: ["analytics", "Google Analytics", "tracking", "mobile friendly", "responsive", "PWA", "SEO"],
  web_presence_quality: ["press", "blog", "mentions", "backlinks", "domain authority", "traffic", "social"],
  fraud_risk_pattern_score: ["chargeback", "fraud", "complaint", "scam", "refund", "lawsuit", "security breach"],
  traffic_check: ["monthly visits", "traffic", "SimilarWeb", "Alexa", "semrush", "traffic estimate"],
  brand_search_volume: ["search volume", "brand searches", "Google Trends", "searches for"],
};

/**
 * Build a search-engine-shaped query for one factor of one company, e.g.
 * `("Acme Co" checkout OR "buy now" OR pricing) SaaS site:acme.io`
 *
 * Unknown factors search for the factor name plus "website" and "reviews".
 */
export function buildFactorQuery(
  companyName: string | null | undefined,
  industry: string | null | undefined,
  sourceUrl: string | null | undefined,
  factor: string
): string {
  const name = (companyName ?? "").trim();
  const quotedName = name ? `"${name}"` : "";

  const keywords = (isFactorKey(factor) ? FACTOR_KEYWORDS[factor] : [factor, "website", "reviews"]).slice(0, MAX_KEYWORDS);
  const orClause = keywords.map(k => (k.includes(" ") ? `"${k}"` : k)).join(" OR ");

  const parts = [quotedName, orClause].filter(Boolean);
  let query = `(${parts.join(" ")})`;

  const trimmedIndustry = (industry ?? "").trim();
  if (trimmedIndustry) {
    query = `${query} ${trimmedIndustry}`;
  }

  const domain = extractDomain(sourceUrl);
  if (domain) {
    query = `${query} site:${domain}`;
  }

  return query;
}

/**
 * Host of a URL; bare domains ("acme.io/shop") are read as https URLs.
 * Returns null when nothing parses.
 */
export function extractDomain(sourceUrl: string | null | undefined): string | null {
  const raw = (sourceUrl ?? "").trim();
  if (!raw) return null;

  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `https://${raw}`;
  try {
    const host = new URL(candidate).host;
    return host || null;
  } catch {
    return null;
  }
}
