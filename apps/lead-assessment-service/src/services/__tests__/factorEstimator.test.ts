import {
  FactorEstimator,
  buildFactorPrompt,
  buildEstimatePrompt,
  extractFactorValue,
  factorValueKeys,
} from "../factorEstimator";
import {
  FakeSearchProvider,
  FakeCompletionProvider,
  isEstimatePrompt,
  evidence,
  makeLead,
} from "../../__tests__/helpers/fakes";

describe("Factor Estimator", () => {
  const lead = makeLead();

  describe("extractFactorValue", () => {
    it("should prefer the factor key over the generic keys", () => {
      expect(extractFactorValue({ tech_stack: "Shopify", value: "Custom" }, "tech_stack")).toEqual({
        value: "Shopify",
      });
    });

    it("should fall back through value, score and result in order", () => {
      expect(extractFactorValue({ score: 0.4, result: 0.9 }, "traffic_check")).toEqual({ value: 0.4 });
      expect(extractFactorValue({ traffic_check: null, result: 0.9 }, "traffic_check")).toEqual({ value: 0.9 });
    });

    it("should read the first element of an array answer", () => {
      expect(
        extractFactorValue([{ company_scale: "SMB", rationale: "team of 12" }, { company_scale: "Enterprise" }], "company_scale")
      ).toEqual({ value: "SMB", rationale: "team of 12" });
    });

    it("should return nothing for a non-object answer", () => {
      expect(extractFactorValue("Shopify", "tech_stack")).toEqual({});
      expect(extractFactorValue([1, 2], "tech_stack")).toEqual({});
    });

    it("should pick up a numeric lead_score and ignore a non-numeric one", () => {
      expect(extractFactorValue({ value: 0.5, lead_score: 72 }, "traffic_check")).toEqual({ value: 0.5, leadScore: 72 });
      expect(extractFactorValue({ value: 0.5, lead_score: "72" }, "traffic_check")).toEqual({ value: 0.5 });
    });

    it("should ignore an empty rationale", () => {
      expect(extractFactorValue({ value: 1, rationale: "" }, "traffic_check")).toEqual({ value: 1 });
    });

    it("should list candidate keys in priority order", () => {
      expect(factorValueKeys("tech_stack")).toEqual(["tech_stack", "value", "score", "result"]);
    });
  });

  describe("prompts", () => {
    it("should describe the score range for score factors", () => {
      const prompt = buildFactorPrompt(lead, "transaction_intent_score", []);

      expect(prompt).toContain("Field: transaction_intent_score\n");
      expect(prompt).toContain('The value of "transaction_intent_score" must be a float between 0 and 1.');
      expect(prompt).toContain('LEAD:\n{"company_name":"Acme Co","source_url":"https://acme.io","industry":"SaaS"}');
    });

    it("should list the allowed categories for categorical factors", () => {
      const prompt = buildEstimatePrompt(lead, "tech_stack", []);

      expect(prompt).toContain("best-effort ESTIMATE for the field `tech_stack`");
      expect(prompt).toContain(
        "must be one of 'Shopify', 'WooCommerce', 'WordPress', 'Custom', or 'Unknown'."
      );
      expect(prompt).toContain("SEARCH_SNIPPETS:\n[]\n");
    });
  });

  describe("estimate", () => {
    it("should search once with three results and use the evidence prompt", async () => {
      const snippet = evidence("q", { snippet: "Acme processes payments online" });
      const search = new FakeSearchProvider(() => [snippet]);
      const completion = new FakeCompletionProvider(() => '{"transaction_intent_score": 0.8, "rationale": "Checkout page"}');
      const estimator = new FactorEstimator({ search, completion });

      const result = await estimator.estimate(lead, "transaction_intent_score");

      expect(search.calls).toEqual([
        {
          query: '("Acme Co" checkout OR "buy now" OR pricing OR "add to cart" OR purchase OR orders) SaaS site:acme.io',
          numResults: 3,
        },
      ]);
      expect(completion.prompts).toHaveLength(1);
      expect(isEstimatePrompt(completion.prompts[0])).toBe(false);
      expect(result).toEqual({
        ok: true,
        value: {
          factor: "transaction_intent_score",
          evidence: [snippet],
          value: 0.8,
          rationale: "Checkout page",
        },
      });
    });

    it("should use the estimate prompt when the search finds nothing", async () => {
      const completion = new FakeCompletionProvider(() => '{"company_scale": "SMB", "estimated": true}');
      const estimator = new FactorEstimator({ search: new FakeSearchProvider(), completion });

      const result = await estimator.estimate(lead, "company_scale");

      expect(completion.prompts).toHaveLength(1);
      expect(isEstimatePrompt(completion.prompts[0])).toBe(true);
      expect(result).toEqual({
        ok: true,
        value: { factor: "company_scale", evidence: [], value: "SMB", estimated: true },
      });
    });

    it("should keep the evidence prompt without results when the policy is never", async () => {
      const completion = new FakeCompletionProvider(() => "{}");
      const estimator = new FactorEstimator({ search: new FakeSearchProvider(), completion, estimatePolicy: "never" });

      const result = await estimator.estimate(lead, "company_scale");

      expect(completion.prompts).toHaveLength(1);
      expect(isEstimatePrompt(completion.prompts[0])).toBe(false);
      expect(result).toEqual({ ok: true, value: { factor: "company_scale", evidence: [] } });
    });

    it("should treat a throwing search as no evidence", async () => {
      const search = new FakeSearchProvider(() => {
        throw new Error("socket hang up");
      });
      const completion = new FakeCompletionProvider(() => '{"value": "Services"}');
      const estimator = new FactorEstimator({ search, completion });

      const result = await estimator.estimate(lead, "merchant_category");

      expect(isEstimatePrompt(completion.prompts[0])).toBe(true);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.value).toBe("Services");
        expect(result.value.evidence).toEqual([]);
      }
    });

    it("should fail the factor with its evidence when output stays unparsable", async () => {
      const snippet = evidence("q");
      const completion = new FakeCompletionProvider(() => "I could not decide");
      const estimator = new FactorEstimator({ search: new FakeSearchProvider(() => [snippet]), completion });

      const result = await estimator.estimate(lead, "tech_stack");

      expect(completion.prompts).toHaveLength(2);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.factor).toBe("tech_stack");
        expect(result.error.evidence).toEqual([snippet]);
        expect(result.error.error.kind).toBe("unparsable_output");
      }
    });

    it("should fail the factor with completion_failed when the provider throws", async () => {
      const completion = new FakeCompletionProvider(() => {
        throw new Error("overloaded");
      });
      const estimator = new FactorEstimator({ search: new FakeSearchProvider(), completion });

      const result = await estimator.estimate(lead, "tech_stack");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.error.kind).toBe("completion_failed");
      }
    });

    describe("with the no_value policy", () => {
      it("should retry with the estimate prompt when evidence yields no value", async () => {
        const completion = new FakeCompletionProvider(prompt =>
          isEstimatePrompt(prompt) ? '{"traffic_check": 0.3}' : '{"rationale": "nothing useful"}'
        );
        const estimator = new FactorEstimator({
          search: new FakeSearchProvider(() => [evidence("q")]),
          completion,
          estimatePolicy: "no_value",
        });

        const result = await estimator.estimate(lead, "traffic_check");

        expect(completion.prompts.map(isEstimatePrompt)).toEqual([false, true]);
        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.value.value).toBe(0.3);
          expect(result.value.estimated).toBe(true);
        }
      });

      it("should keep the primary answer when the estimate attempt fails", async () => {
        const completion = new FakeCompletionProvider(prompt => {
          if (isEstimatePrompt(prompt)) {
            throw new Error("timeout");
          }
          return '{"rationale": "no signal"}';
        });
        const estimator = new FactorEstimator({
          search: new FakeSearchProvider(() => [evidence("q")]),
          completion,
          estimatePolicy: "no_value",
        });

        const result = await estimator.estimate(lead, "traffic_check");

        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.value.value).toBeUndefined();
          expect(result.value.rationale).toBe("no signal");
          expect(result.value.estimated).toBeUndefined();
        }
      });

      it("should not retry when the evidence prompt yields a value", async () => {
        const completion = new FakeCompletionProvider(() => '{"traffic_check": 0.9}');
        const estimator = new FactorEstimator({
          search: new FakeSearchProvider(() => [evidence("q")]),
          completion,
          estimatePolicy: "no_value",
        });

        await estimator.estimate(lead, "traffic_check");

        expect(completion.prompts).toHaveLength(1);
      });
    });
  });
});
