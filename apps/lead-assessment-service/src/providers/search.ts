import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { Evidence } from "../types/lead";
import { Result, ok, err } from "../types/result";
import { TransientSearchFailure, errorMessage } from "../services/errors";

/**
 * Web search capability consumed by the factor estimator.
 * Implementations must never throw: any transport or auth error yields [].
 */
export interface SearchProvider {
  search(query: string, numResults: number): Promise<Evidence[]>;
}

// ============================================================================
// SERPER
// ============================================================================

const SERPER_ENDPOINT = "https://google.serper.dev/search";

export interface SerperSearchOptions {
  apiKey: string;
  timeoutMs?: number;
  endpoint?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Serper (https://serper.dev) Google search client
 */
export class SerperSearchProvider implements SearchProvider {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SerperSearchOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.endpoint = options.endpoint ?? SERPER_ENDPOINT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, numResults: number): Promise<Evidence[]> {
    const result = await this.request(query, numResults);

    if (!result.ok) {
      console.warn(`[search:serper] Search failed for "${query}": ${result.error.message}`);
      return [];
    }

    return result.value;
  }

  private async request(
    query: string,
    numResults: number
  ): Promise<Result<Evidence[], TransientSearchFailure>> {
    if (!this.apiKey) {
      return err(new TransientSearchFailure("SERPER_API_KEY not configured"));
    }

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "X-API-KEY": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ q: query, num: numResults }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        return err(new TransientSearchFailure(`Serper responded ${response.status}`));
      }

      const payload: unknown = await response.json();
      return ok(parseSerperResults(payload, query).slice(0, numResults));
    } catch (error) {
      return err(new TransientSearchFailure(errorMessage(error), { cause: error }));
    }
  }
}

/**
 * Map a Serper response body to evidence items.
 * Standard responses list results under `organic`; some variants use `results`.
 */
export function parseSerperResults(payload: unknown, query: string): Evidence[] {
  if (!isRecord(payload)) return [];

  const items = Array.isArray(payload.organic)
    ? payload.organic
    : Array.isArray(payload.results)
      ? payload.results
      : [];

  const evidence: Evidence[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    evidence.push({
      query,
      title: firstString(item, ["title"]),
      snippet: firstString(item, ["snippet", "summary", "description"]),
      link: firstString(item, ["link", "url", "source"]),
    });
  }
  return evidence;
}

// ============================================================================
// FILE CACHE
// ============================================================================

/**
 * Caches non-empty search responses as JSON files keyed by a hash of the request.
 * Cache I/O problems are logged and otherwise ignored.
 */
export class CachedSearchProvider implements SearchProvider {
  constructor(
    private readonly inner: SearchProvider,
    private readonly cacheDir: string
  ) {}

  async search(query: string, numResults: number): Promise<Evidence[]> {
    const file = path.join(this.cacheDir, `${searchCacheKey(query, numResults)}.json`);

    const cached = await this.read(file);
    if (cached && cached.length > 0) {
      return cached;
    }

    const results = await this.inner.search(query, numResults);
    if (results.length > 0) {
      await this.write(file, results);
    }
    return results;
  }

  private async read(file: string): Promise<Evidence[] | null> {
    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch {
      // Not cached yet
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return Array.isArray(parsed) ? parsed.filter(isEvidence) : null;
    } catch (error) {
      console.warn(`[search:cache] Failed to read ${file}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async write(file: string, results: Evidence[]): Promise<void> {
    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      await fs.writeFile(file, JSON.stringify(results), "utf-8");
    } catch (error) {
      console.warn(`[search:cache] Failed to write ${file}: ${errorMessage(error)}`);
    }
  }
}

export function searchCacheKey(query: string, numResults: number): string {
  return createHash("sha256").update(`${query}\n${numResults}`, "utf-8").digest("hex");
}

// ============================================================================
// HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(record: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value) {
      return value;
    }
  }
  return "";
}

function isEvidence(value: unknown): value is Evidence {
  return (
    isRecord(value) &&
    typeof value.query === "string" &&
    typeof value.title === "string" &&
    typeof value.snippet === "string" &&
    typeof value.link === "string"
  );
}
