import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import { LeadStore } from "./db/store";
import { LeadAssessmentService } from "./services/leadAssessment";
import { createLeadsRouter } from "./routes/leads";
import { createStatsRouter } from "./routes/stats";
import { errorMessage } from "./services/errors";

export interface AppDeps {
  store: LeadStore;
  service: LeadAssessmentService;
}

export function createApp({ store, service }: AppDeps) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Mount routes
  app.use("/leads", createLeadsRouter({ service, store }));
  app.use("/stats", createStatsRouter(store));

  // Malformed JSON bodies and anything a route let slip
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: `Invalid JSON body: ${error.message}` });
      return;
    }
    console.error(`[server] Unhandled error:`, errorMessage(error));
    res.status(500).json({ error: errorMessage(error) });
  });

  return app;
}
