import { Router, Request, Response } from "express";
import { z } from "zod";
import { Lead, LEAD_STATUSES } from "../types/lead";
import { LeadStore } from "../db/store";
import { LeadAssessmentService } from "../services/leadAssessment";
import { leadsToCsv } from "../services/csvExport";
import { errorMessage } from "../services/errors";

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const assessRequestSchema = z.object({
  lead_ids: z.array(z.number().int()).optional(),
  limit: z.number().int().min(1).default(5),
});

export const listQuerySchema = z.object({
  status: z.enum(LEAD_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const exportQuerySchema = z.object({
  min_score: z.coerce.number().default(0),
});

const leadIdSchema = z.coerce.number().int().positive();

export interface LeadsRouterDeps {
  service: LeadAssessmentService;
  store: LeadStore;
}

/**
 * Lead detail as returned by the API
 */
export function toLeadResponse(lead: Lead) {
  return {
    id: lead.id,
    company_name: lead.company_name,
    industry: lead.industry ?? "",
    source_url: lead.source_url ?? "",
    description: lead.description ?? "",
    lead_score: lead.lead_score,
    status: lead.status,
    assessment: lead.assessment,
    created_at: lead.created_at,
    updated_at: lead.updated_at,
  };
}

function sendInvalid(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: "Invalid request", details: error.flatten() });
}

export function createLeadsRouter({ service, store }: LeadsRouterDeps): Router {
  const router = Router();

  /**
   * POST /leads/assess
   * Assess the given lead_ids, or up to `limit` unassessed leads
   */
  router.post("/assess", async (req: Request, res: Response) => {
    const parsed = assessRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendInvalid(res, parsed.error);
    }

    try {
      const { lead_ids, limit } = parsed.data;
      const assessments = lead_ids && lead_ids.length > 0
        ? await service.assessByIds(lead_ids)
        : await service.assessAll(limit);

      console.log(`[leads] Assessed ${assessments.length} leads`);

      return res.status(200).json({
        status: "success",
        message: `Successfully assessed ${assessments.length} leads`,
        assessments_count: assessments.length,
        assessments,
      });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[leads] Lead assessment failed:`, message);
      return res.status(500).json({ error: `Lead assessment failed: ${message}` });
    }
  });

  /**
   * GET /leads
   */
  router.get("/", async (req: Request, res: Response) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendInvalid(res, parsed.error);
    }

    try {
      const { status, limit, offset } = parsed.data;
      const page = await store.list({ status, limit, offset });

      return res.status(200).json({
        status: "success",
        total: page.total,
        limit,
        offset,
        leads: page.leads.map(toLeadResponse),
      });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[leads] Failed to list leads:`, message);
      return res.status(500).json({ error: `Failed to list leads: ${message}` });
    }
  });

  /**
   * GET /leads/export.csv
   */
  router.get("/export.csv", async (req: Request, res: Response) => {
    const parsed = exportQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendInvalid(res, parsed.error);
    }

    try {
      const leads = await store.listForExport(parsed.data.min_score);
      console.log(`[leads] Exporting ${leads.length} leads to CSV`);

      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", 'attachment; filename="leads.csv"');
      return res.status(200).send(leadsToCsv(leads));
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[leads] CSV export failed:`, message);
      return res.status(500).json({ error: `CSV export failed: ${message}` });
    }
  });

  /**
   * GET /leads/:id
   */
  router.get("/:id", async (req: Request, res: Response) => {
    const parsedId = leadIdSchema.safeParse(req.params.id);
    if (!parsedId.success) {
      return sendInvalid(res, parsedId.error);
    }

    try {
      const lead = await store.getById(parsedId.data);
      if (!lead) {
        return res.status(404).json({ error: `Lead with ID ${parsedId.data} not found` });
      }
      return res.status(200).json(toLeadResponse(lead));
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[leads] Failed to retrieve lead ${parsedId.data}:`, message);
      return res.status(500).json({ error: `Failed to retrieve lead: ${message}` });
    }
  });

  return router;
}
