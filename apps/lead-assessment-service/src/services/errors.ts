/**
 * Failure taxonomy of the assessment pipeline
 *
 * Every error carries a `kind` so call sites can branch without instanceof chains.
 */

export type PipelineErrorKind =
  | "transient_search_failure"
  | "completion_failed"
  | "unparsable_output"
  | "aggregate_failure"
  | "persistence_failure";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Search call failed or timed out; the factor proceeds with no evidence */
export class TransientSearchFailure extends PipelineError {
  readonly kind = "transient_search_failure";
}

/** The completion provider threw before returning any text */
export class CompletionFailedError extends PipelineError {
  readonly kind = "completion_failed";
}

/** Model output could not be turned into JSON, even after one repair attempt */
export class UnparsableOutputError extends PipelineError {
  readonly kind = "unparsable_output";

  constructor(message: string, readonly rawText: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Something outside per-factor handling threw */
export class AggregateFailure extends PipelineError {
  readonly kind = "aggregate_failure";
}

/** Writing an assessment to the lead store failed; nothing was written */
export class PersistenceFailure extends PipelineError {
  readonly kind = "persistence_failure";
}

export type FactorError = CompletionFailedError | UnparsableOutputError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
