import { SupabaseClient } from "@supabase/supabase-js";
import {
  Lead,
  LeadInsert,
  LeadPage,
  LeadRow,
  LeadStats,
  LeadStatus,
  ListLeadsOptions,
  Assessment,
} from "../types/lead";
import { Result, ok, err } from "../types/result";
import { PersistenceFailure } from "../services/errors";
import { mapRowToLead, buildAssessedUpdate, averageLeadScore } from "../mappers/leadRow";
import { LeadStore } from "./store";
import { NOT_FOUND_CODE, RANGE_NOT_SATISFIABLE_CODE } from "./supabase";

const TABLE = "leads";

/** Supabase caps a single response at 1000 rows by default */
const DEFAULT_PAGE_SIZE = 1000;

/** Rows the API reports as "new": any status other than "assessed", null included */
const UNASSESSED_FILTER = "status.is.null,status.neq.assessed";

export interface SupabaseLeadStoreOptions {
  pageSize?: number;
}

/**
 * Lead store backed by the Supabase `leads` table
 */
export class SupabaseLeadStore implements LeadStore {
  private readonly pageSize: number;

  constructor(
    private readonly supabase: SupabaseClient,
    options: SupabaseLeadStoreOptions = {}
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async insert(lead: LeadInsert): Promise<Lead> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .insert({ ...lead, status: lead.status ?? "new", lead_score: lead.lead_score ?? 0 })
      .select()
      .single();

    if (error) {
      console.error("[leads] Insert error:", error.message);
      throw new Error(`Failed to insert lead: ${error.message}`);
    }

    const row: LeadRow = data;
    return mapRowToLead(row);
  }

  async getById(id: number): Promise<Lead | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select("*")
      .eq("id", id)
      .single();

    if (error) {
      if (error.code === NOT_FOUND_CODE) return null;
      throw new Error(`Failed to get lead: ${error.message}`);
    }

    const row: LeadRow = data;
    return mapRowToLead(row);
  }

  async loadUnassessed(limit?: number): Promise<Lead[]> {
    let query = this.supabase
      .from(TABLE)
      .select("*")
      .or(UNASSESSED_FILTER)
      .order("created_at", { ascending: true })
      .order("id", { ascending: true });

    if (limit) {
      query = query.limit(limit);
    }

    const { data, error } = await query;

    if (error) {
      throw new Error(`Failed to load unassessed leads: ${error.message}`);
    }

    const rows: LeadRow[] = data ?? [];
    return rows.map(mapRowToLead);
  }

  async list(options: ListLeadsOptions): Promise<LeadPage> {
    const total = await this.count(options.status);
    // A range starting past the last row is rejected with PGRST103
    if (options.offset >= total) {
      return { total, leads: [] };
    }

    let query = this.supabase.from(TABLE).select("*");

    if (options.status === "assessed") {
      query = query.eq("status", "assessed");
    } else if (options.status === "new") {
      query = query.or(UNASSESSED_FILTER);
    }

    const { data, error } = await query
      .order("id", { ascending: true })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) {
      if (error.code === RANGE_NOT_SATISFIABLE_CODE) return { total, leads: [] };
      throw new Error(`Failed to list leads: ${error.message}`);
    }

    const rows: LeadRow[] = data ?? [];
    return { total, leads: rows.map(mapRowToLead) };
  }

  async listForExport(minScore: number = 0): Promise<Lead[]> {
    const rows = await this.readAllPages<LeadRow>("list leads for export", (from, to) =>
      this.supabase
        .from(TABLE)
        .select("*")
        .gte("lead_score", minScore)
        .order("lead_score", { ascending: false })
        .order("id", { ascending: true })
        .range(from, to)
    );

    return rows.map(mapRowToLead);
  }

  async stats(): Promise<LeadStats> {
    const [total, assessed] = await Promise.all([this.count(), this.count("assessed")]);

    const scored = await this.readAllPages<Pick<LeadRow, "lead_score">>("get lead stats", (from, to) =>
      this.supabase
        .from(TABLE)
        .select("lead_score")
        .eq("status", "assessed")
        .order("id", { ascending: true })
        .range(from, to)
    );

    return {
      total_leads: total,
      assessed_leads: assessed,
      new_leads: total - assessed,
      average_lead_score: averageLeadScore(scored.map(r => r.lead_score)),
    };
  }

  async save(lead: Lead, assessment: Assessment): Promise<Result<Lead, PersistenceFailure>> {
    // One UPDATE statement: status, score and payload land together or not at all
    const update = buildAssessedUpdate(lead, assessment, new Date().toISOString());

    try {
      const { data, error } = await this.supabase
        .from(TABLE)
        .update(update)
        .eq("id", lead.id)
        .select()
        .single();

      if (error) {
        console.error(`[leads] Failed to persist assessment for lead ${lead.id}:`, error.message);
        return err(new PersistenceFailure(`Failed to persist assessment: ${error.message}`));
      }

      const row: LeadRow = data;
      return ok(mapRowToLead(row));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[leads] Failed to persist assessment for lead ${lead.id}:`, message);
      return err(new PersistenceFailure(`Failed to persist assessment: ${message}`, { cause: error }));
    }
  }

  /**
   * Exact row count without reading rows
   */
  private async count(status?: LeadStatus): Promise<number> {
    let query = this.supabase.from(TABLE).select("*", { count: "exact", head: true });

    if (status === "assessed") {
      query = query.eq("status", "assessed");
    } else if (status === "new") {
      query = query.or(UNASSESSED_FILTER);
    }

    const { count, error } = await query;

    if (error) {
      throw new Error(`Failed to count leads: ${error.message}`);
    }

    return count ?? 0;
  }

  /**
   * Read every row of an ordered query, one page at a time, until a short page comes back
   */
  private async readAllPages<T>(
    action: string,
    fetchPage: (from: number, to: number) => PromiseLike<{ data: T[] | null; error: { message: string } | null }>
  ): Promise<T[]> {
    const rows: T[] = [];

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await fetchPage(from, from + this.pageSize - 1);

      if (error) {
        throw new Error(`Failed to ${action}: ${error.message}`);
      }

      const page = data ?? [];
      rows.push(...page);
      if (page.length < this.pageSize) {
        return rows;
      }
    }
  }
}
