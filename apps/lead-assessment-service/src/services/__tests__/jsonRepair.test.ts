import { stripFences, tryParseJson, parseWithRepair, generateJson, buildRepairPrompt } from "../jsonRepair";
import { FakeCompletionProvider } from "../../__tests__/helpers/fakes";

const schemaHint = 'a single JSON object {"tech_stack": <string>}';

describe("JSON Repair", () => {
  describe("stripFences", () => {
    it("should strip a json-tagged fence", () => {
      expect(stripFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it("should strip an untagged fence and surrounding whitespace", () => {
      expect(stripFences("  \n```\n[1, 2]\n```  ")).toBe("[1, 2]");
    });

    it("should handle an unterminated fence", () => {
      expect(stripFences('```json {"a": 1}')).toBe('{"a": 1}');
    });

    it("should leave unfenced text alone apart from trimming", () => {
      expect(stripFences('  {"a": 1}\n')).toBe('{"a": 1}');
    });
  });

  describe("tryParseJson", () => {
    it("should give the same value with or without a prior fence-strip", () => {
      const samples = ['{"a": 1, "b": [true, null]}', "[1, 2, 3]", '  {"nested": {"x": "y"}}  '];

      for (const sample of samples) {
        const direct = tryParseJson(sample);
        const stripped = tryParseJson(stripFences(sample));
        expect(direct).toEqual(stripped);
        expect(direct).toEqual({ ok: true, value: JSON.parse(sample) });
      }
    });

    it("should parse fenced JSON", () => {
      expect(tryParseJson('```json\n{"score": 0.5}\n```')).toEqual({ ok: true, value: { score: 0.5 } });
    });

    it("should return an unparsable_output error for invalid JSON", () => {
      const result = tryParseJson("{score: 0.5,}");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("unparsable_output");
        expect(result.error.rawText).toBe("{score: 0.5,}");
      }
    });
  });

  describe("parseWithRepair", () => {
    it("should not call the provider when the text is already valid", async () => {
      const provider = new FakeCompletionProvider(() => "{}");

      const result = await parseWithRepair(provider, '{"tech_stack": "Shopify"}', { schemaHint });

      expect(result).toEqual({ ok: true, value: { tech_stack: "Shopify" } });
      expect(provider.prompts).toHaveLength(0);
    });

    it("should ask the provider once and parse its fenced answer", async () => {
      const provider = new FakeCompletionProvider(() => '```json\n{"tech_stack": "Shopify"}\n```');

      const result = await parseWithRepair(provider, "tech_stack: Shopify", { schemaHint });

      expect(result).toEqual({ ok: true, value: { tech_stack: "Shopify" } });
      expect(provider.prompts).toHaveLength(1);
      expect(provider.prompts[0]).toContain("RAW_OUTPUT:\ntech_stack: Shopify");
      expect(provider.prompts[0]).toContain(schemaHint);
    });

    it("should give up after a single repair attempt", async () => {
      const provider = new FakeCompletionProvider(() => "still not json");

      const result = await parseWithRepair(provider, "not json", { schemaHint });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("unparsable_output");
      }
      expect(provider.prompts).toHaveLength(1);
    });

    it("should report unparsable output when the repair call throws", async () => {
      const provider = new FakeCompletionProvider(() => {
        throw new Error("rate limited");
      });

      const result = await parseWithRepair(provider, "not json", { schemaHint });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("unparsable_output");
        expect(result.error.message).toBe("JSON repair call failed: rate limited");
      }
    });
  });

  describe("generateJson", () => {
    it("should return completion_failed when the provider throws", async () => {
      const provider = new FakeCompletionProvider(() => {
        throw new Error("connection reset");
      });

      const result = await generateJson(provider, "prompt", { schemaHint, maxTokens: 800 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("completion_failed");
        expect(result.error.message).toBe("Completion failed: connection reset");
      }
    });

    it("should parse a direct answer with a single provider call", async () => {
      const provider = new FakeCompletionProvider(() => '{"value": 3}');

      const result = await generateJson(provider, "prompt", { schemaHint, maxTokens: 800 });

      expect(result).toEqual({ ok: true, value: { value: 3 } });
      expect(provider.prompts).toEqual(["prompt"]);
    });
  });

  describe("buildRepairPrompt", () => {
    it("should embed the fence-stripped raw output", () => {
      const prompt = buildRepairPrompt("```json\n{broken\n```", schemaHint);
      expect(prompt.endsWith("RAW_OUTPUT:\n{broken")).toBe(true);
    });
  });
});
