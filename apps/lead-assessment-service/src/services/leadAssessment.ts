import {
  Lead,
  AssessmentOutcome,
  LeadAssessmentEntry,
  isAssessmentFailure,
} from "../types/lead";
import { LeadStore } from "../db/store";
import { AssessmentAggregator } from "./assessment";

/**
 * Assess leads and persist each result as soon as it is ready.
 * Leads are processed one at a time; a failed lead never stops the batch.
 */
export class LeadAssessmentService {
  constructor(
    private readonly aggregator: AssessmentAggregator,
    private readonly store: LeadStore
  ) {}

  /**
   * Assess a single lead without persisting
   */
  async assessLead(lead: Lead): Promise<AssessmentOutcome> {
    return this.aggregator.assess(lead);
  }

  /**
   * Assess (up to `limit`) unassessed leads, oldest first
   */
  async assessAll(limit?: number): Promise<LeadAssessmentEntry[]> {
    const leads = await this.store.loadUnassessed(limit);
    console.log(`[leadAssessment] ${leads.length} unassessed lead(s) to process`);

    const results: LeadAssessmentEntry[] = [];
    for (const lead of leads) {
      results.push(await this.assessAndPersist(lead));
    }
    return results;
  }

  /**
   * Assess specific leads; unknown ids are logged and skipped
   */
  async assessByIds(ids: number[]): Promise<LeadAssessmentEntry[]> {
    const results: LeadAssessmentEntry[] = [];

    for (const id of ids) {
      const lead = await this.store.getById(id);
      if (!lead) {
        console.warn(`[leadAssessment] Lead with ID ${id} not found`);
        continue;
      }
      results.push(await this.assessAndPersist(lead));
    }

    return results;
  }

  private async assessAndPersist(lead: Lead): Promise<LeadAssessmentEntry> {
    const assessment = await this.assessLead(lead);

    if (isAssessmentFailure(assessment)) {
      console.warn(`[leadAssessment] Not persisting failed assessment for lead ${lead.id}: ${assessment.error}`);
    } else {
      const saved = await this.store.save(lead, assessment);
      if (!saved.ok) {
        console.error(`[leadAssessment] Lead ${lead.id} left unchanged: ${saved.error.message}`);
      }
    }

    return { leadId: lead.id, companyName: lead.company_name, assessment };
  }
}
