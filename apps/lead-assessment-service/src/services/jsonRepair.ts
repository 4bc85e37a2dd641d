import { CompletionProvider } from "../providers/completion";
import { JsonValue } from "../types/lead";
import { Result, ok, err } from "../types/result";
import { CompletionFailedError, UnparsableOutputError, errorMessage } from "./errors";

const REPAIR_MAX_TOKENS = 3000;

export interface RepairOptions {
  /** Describes the JSON shape the repaired output must match */
  schemaHint: string;
}

export interface GenerateJsonOptions extends RepairOptions {
  maxTokens: number;
}

/**
 * Remove a surrounding ``` fence (and an optional `json` tag) from model output
 */
export function stripFences(rawText: string): string {
  let text = rawText.trim();

  if (text.startsWith("```")) {
    const parts = text.split("```");
    if (parts.length >= 2) {
      text = parts[1];
      if (text.startsWith("json")) {
        text = text.slice(4);
      }
    }
  }

  return text.trim();
}

/**
 * Parse fence-stripped text as JSON without any repair attempt
 */
export function tryParseJson(rawText: string): Result<JsonValue, UnparsableOutputError> {
  const text = stripFences(rawText);
  try {
    const parsed: JsonValue = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    return err(new UnparsableOutputError(`Invalid JSON: ${errorMessage(error)}`, rawText, { cause: error }));
  }
}

export function buildRepairPrompt(rawText: string, schemaHint: string): string {
  return (
    "The assistant produced the following response which is intended to be JSON, but it is not valid JSON. " +
    `Please convert it into valid JSON matching this shape: ${schemaHint}. ` +
    "Preserve as much information as possible from the original output. " +
    "Return ONLY the JSON, no explanations.\n\n" +
    `RAW_OUTPUT:\n${stripFences(rawText)}`
  );
}

/**
 * Parse model output as JSON, asking the provider once to rewrite it when it is not valid.
 * There is exactly one repair attempt.
 */
export async function parseWithRepair(
  provider: CompletionProvider,
  rawText: string,
  options: RepairOptions
): Promise<Result<JsonValue, UnparsableOutputError>> {
  const direct = tryParseJson(rawText);
  if (direct.ok) {
    return direct;
  }

  console.warn(`[jsonRepair] Initial JSON parse failed, asking model to reformat`);

  let fixedText: string;
  try {
    fixedText = await provider.complete(buildRepairPrompt(rawText, options.schemaHint), REPAIR_MAX_TOKENS);
  } catch (error) {
    return err(new UnparsableOutputError(`JSON repair call failed: ${errorMessage(error)}`, rawText, { cause: error }));
  }

  const repaired = tryParseJson(fixedText);
  if (!repaired.ok) {
    console.warn(`[jsonRepair] Repaired output is still not valid JSON`);
    return err(new UnparsableOutputError(`Output not valid JSON after repair: ${repaired.error.message}`, rawText));
  }

  console.log(`[jsonRepair] Model reformatted output into valid JSON`);
  return repaired;
}

/**
 * Complete a prompt and parse the answer as JSON (with one repair attempt)
 */
export async function generateJson(
  provider: CompletionProvider,
  prompt: string,
  options: GenerateJsonOptions
): Promise<Result<JsonValue, CompletionFailedError | UnparsableOutputError>> {
  let rawText: string;
  try {
    rawText = await provider.complete(prompt, options.maxTokens);
  } catch (error) {
    return err(new CompletionFailedError(`Completion failed: ${errorMessage(error)}`, { cause: error }));
  }

  return parseWithRepair(provider, rawText, options);
}
