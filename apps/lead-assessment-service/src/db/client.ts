import {
  Lead,
  LeadInsert,
  LeadPage,
  LeadRow,
  LeadStats,
  ListLeadsOptions,
  Assessment,
} from "../types/lead";
import { Result, ok, err } from "../types/result";
import { PersistenceFailure } from "../services/errors";
import { mapRowToLead, buildAssessedUpdate, computeLeadStats, toLeadStatus } from "../mappers/leadRow";
import { LeadStore } from "./store";

/**
 * In-memory lead store
 * Used when Supabase is not configured (development) and in tests
 */
export class InMemoryLeadStore implements LeadStore {
  private readonly rows: Map<number, LeadRow> = new Map();
  private nextId = 1;

  async insert(lead: LeadInsert): Promise<Lead> {
    const now = new Date().toISOString();
    const id = lead.id ?? this.nextId;
    this.nextId = Math.max(this.nextId, id + 1);

    const row: LeadRow = {
      id,
      company_name: lead.company_name,
      industry: lead.industry,
      description: lead.description,
      source_url: lead.source_url,
      company_size: lead.company_size,
      search_query: lead.search_query,
      lead_score: lead.lead_score ?? 0,
      status: lead.status ?? "new",
      raw_data: lead.raw_data,
      created_at: lead.created_at ?? now,
      updated_at: lead.updated_at ?? now,
    };

    this.rows.set(id, row);
    return mapRowToLead(row);
  }

  async getById(id: number): Promise<Lead | null> {
    const row = this.rows.get(id);
    return row ? mapRowToLead(row) : null;
  }

  async loadUnassessed(limit?: number): Promise<Lead[]> {
    const pending = this.sortedRows(byCreatedAt).filter(r => toLeadStatus(r.status) === "new");
    return (limit ? pending.slice(0, limit) : pending).map(mapRowToLead);
  }

  async list(options: ListLeadsOptions): Promise<LeadPage> {
    const matching = this.sortedRows((a, b) => a.id - b.id).filter(
      r => !options.status || toLeadStatus(r.status) === options.status
    );

    return {
      total: matching.length,
      leads: matching.slice(options.offset, options.offset + options.limit).map(mapRowToLead),
    };
  }

  async listForExport(minScore: number = 0): Promise<Lead[]> {
    return this.sortedRows((a, b) => (b.lead_score ?? 0) - (a.lead_score ?? 0) || a.id - b.id)
      .filter(r => (r.lead_score ?? 0) >= minScore)
      .map(mapRowToLead);
  }

  async stats(): Promise<LeadStats> {
    return computeLeadStats([...this.rows.values()]);
  }

  async save(lead: Lead, assessment: Assessment): Promise<Result<Lead, PersistenceFailure>> {
    const existing = this.rows.get(lead.id);
    if (!existing) {
      console.error(`[db] Failed to persist assessment: lead ${lead.id} not found`);
      return err(new PersistenceFailure(`Lead ${lead.id} not found`));
    }

    const update = buildAssessedUpdate(lead, assessment, new Date().toISOString());
    const row: LeadRow = { ...existing, ...update };
    this.rows.set(lead.id, row);

    return ok(mapRowToLead(row));
  }

  private sortedRows(compare: (a: LeadRow, b: LeadRow) => number): LeadRow[] {
    return [...this.rows.values()].sort(compare);
  }
}

function byCreatedAt(a: LeadRow, b: LeadRow): number {
  return a.created_at.localeCompare(b.created_at) || a.id - b.id;
}
