import { Router, Request, Response } from "express";
import { LeadStore } from "../db/store";
import { errorMessage } from "../services/errors";

/**
 * GET /stats
 * Lead counts by status and the average score of assessed leads
 */
export function createStatsRouter(store: LeadStore): Router {
  const router = Router();

  router.get("/", async (_req: Request, res: Response) => {
    try {
      const stats = await store.stats();
      return res.status(200).json({
        status: "success",
        ...stats,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[stats] Failed to get stats:`, message);
      return res.status(500).json({ error: `Failed to get stats: ${message}` });
    }
  });

  return router;
}
