import Anthropic from "@anthropic-ai/sdk";

/**
 * Text completion capability. Callers layer JSON repair on top.
 */
export interface CompletionProvider {
  complete(prompt: string, maxTokens: number): Promise<string>;
}

export interface AnthropicCompletionOptions {
  apiKey: string;
  model: string;
  client?: Anthropic;
}

/**
 * Claude-backed completion provider (single user turn, temperature 0)
 */
export class AnthropicCompletionProvider implements CompletionProvider {
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: AnthropicCompletionOptions) {
    if (!options.client && !options.apiKey) {
      throw new Error("ANTHROPIC_API_KEY not set in environment");
    }
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      temperature: 0,
      messages: [{ role: "user", content: prompt }],
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map(block => block.text)
      .join("");

    if (!text) {
      throw new Error(`Model ${this.model} returned no text (stop_reason: ${response.stop_reason})`);
    }

    return text;
  }
}
