import {
  Lead,
  LeadInsert,
  LeadPage,
  LeadStats,
  ListLeadsOptions,
  Assessment,
} from "../types/lead";
import { Result } from "../types/result";
import { PersistenceFailure } from "../services/errors";

/**
 * Persistence boundary for leads
 */
export interface LeadStore {
  /** Insert a lead with status "new" (used by the generation pipeline and seeding) */
  insert(lead: LeadInsert): Promise<Lead>;

  getById(id: number): Promise<Lead | null>;

  /** Leads not yet assessed, oldest first */
  loadUnassessed(limit?: number): Promise<Lead[]>;

  list(options: ListLeadsOptions): Promise<LeadPage>;

  /** Leads with lead_score >= minScore, highest score first */
  listForExport(minScore?: number): Promise<Lead[]>;

  stats(): Promise<LeadStats>;

  /**
   * Atomically write status, score and payload for one lead.
   * On failure nothing is written and the lead keeps its previous state.
   */
  save(lead: Lead, assessment: Assessment): Promise<Result<Lead, PersistenceFailure>>;
}
