import "dotenv/config";
import { config } from "./config";
import { createLeadStore, isSupabaseConfigured } from "./db";
import { createLeadAssessmentService } from "./services/pipeline";
import { createApp } from "./server";

const store = createLeadStore();
const service = createLeadAssessmentService(store);
const app = createApp({ store, service });

app.listen(config.port, () => {
  console.log(`[server] Lead Assessment Service started`);
  console.log(`[server] Port: ${config.port}`);
  console.log(`[server] Environment: ${config.nodeEnv}`);
  console.log(`[server] Database: ${isSupabaseConfigured() ? "supabase" : "in-memory"}`);
  console.log(`[server] Estimate policy: ${config.estimatePolicy}`);
});
