import { LeadAssessmentService } from "../leadAssessment";
import { AssessmentAggregator } from "../assessment";
import { FactorEstimator } from "../factorEstimator";
import { createLeadAssessmentService, PipelineConfig } from "../pipeline";
import { PersistenceFailure } from "../errors";
import { InMemoryLeadStore } from "../../db/client";
import { Lead, Assessment, LeadInsert } from "../../types/lead";
import { Result, err } from "../../types/result";
import { FakeSearchProvider, scriptedCompletion } from "../../__tests__/helpers/fakes";

function newLead(overrides: Partial<LeadInsert> = {}): LeadInsert {
  return {
    company_name: "Acme Co",
    industry: "SaaS",
    description: null,
    source_url: "https://acme.io",
    company_size: null,
    search_query: null,
    lead_score: null,
    status: "new",
    raw_data: null,
    ...overrides,
  };
}

class FailingSaveStore extends InMemoryLeadStore {
  async save(lead: Lead, _assessment: Assessment): Promise<Result<Lead, PersistenceFailure>> {
    return err(new PersistenceFailure(`write rejected for lead ${lead.id}`));
  }
}

function service(store: InMemoryLeadStore): LeadAssessmentService {
  const completion = scriptedCompletion({ traffic_check: '{"traffic_check": 0.6}' });
  const estimator = new FactorEstimator({ search: new FakeSearchProvider(), completion });
  return new LeadAssessmentService(new AssessmentAggregator(estimator), store);
}

describe("Lead Assessment Service", () => {
  it("should assess and persist every unassessed lead, oldest first", async () => {
    const store = new InMemoryLeadStore();
    await store.insert(newLead({ company_name: "Later Ltd", created_at: "2026-02-01T00:00:00.000Z" }));
    await store.insert(newLead({ company_name: "Early Inc", created_at: "2026-01-01T00:00:00.000Z" }));

    const entries = await service(store).assessAll();

    expect(entries.map(e => e.companyName)).toEqual(["Early Inc", "Later Ltd"]);
    const saved = await store.getById(1);
    expect(saved?.status).toBe("assessed");
    expect(saved?.lead_score).toBe(60);
    expect(saved?.assessment?.traffic_check).toBe(0.6);
    expect(await store.loadUnassessed()).toEqual([]);
  });

  it("should honour the batch limit", async () => {
    const store = new InMemoryLeadStore();
    await store.insert(newLead({ company_name: "One", created_at: "2026-01-01T00:00:00.000Z" }));
    await store.insert(newLead({ company_name: "Two", created_at: "2026-01-02T00:00:00.000Z" }));

    const entries = await service(store).assessAll(1);

    expect(entries.map(e => e.companyName)).toEqual(["One"]);
    expect((await store.loadUnassessed()).map(l => l.company_name)).toEqual(["Two"]);
  });

  it("should skip unknown ids and assess the rest", async () => {
    const store = new InMemoryLeadStore();
    await store.insert(newLead({ id: 7 }));

    const entries = await service(store).assessByIds([99, 7]);

    expect(entries).toHaveLength(1);
    expect(entries[0].leadId).toBe(7);
  });

  it("should leave the lead unchanged when the save fails", async () => {
    const store = new FailingSaveStore();
    await store.insert(newLead());

    const entries = await service(store).assessAll();

    expect(entries).toHaveLength(1);
    expect(entries[0].assessment).toMatchObject({ lead_score: 60 });
    const lead = await store.getById(1);
    expect(lead?.status).toBe("new");
    expect(lead?.assessment).toBeNull();
  });

  it("should report a missing Anthropic key per lead without persisting", async () => {
    const store = new InMemoryLeadStore();
    await store.insert(newLead());
    const cfg: PipelineConfig = {
      serperApiKey: "",
      searchTimeoutMs: 1000,
      searchCacheDir: "",
      anthropicApiKey: "",
      anthropicModel: "test-model",
      estimatePolicy: "no_evidence",
    };

    const entries = await createLeadAssessmentService(store, cfg).assessAll();

    expect(entries).toEqual([
      { leadId: 1, companyName: "Acme Co", assessment: { error: "ANTHROPIC_API_KEY not set in environment" } },
    ]);
    expect((await store.getById(1))?.status).toBe("new");
  });
});
