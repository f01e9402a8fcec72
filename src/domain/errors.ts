export type PipelineFailureKind =
  | "AllProvidersExhausted"
  | "JsonRecoveryFailed"
  | "PdfExtractionFailed"
  | "ValidationFailed"
  | "Cancelled"
  | "DependencyMissing"
  | "GenerationFailed";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineFailureKind;
}

export interface ProviderAttemptRecord {
  provider: string;
  attempt: number;
  outcome: "quota" | "transient" | "client";
  message: string;
}

export class AllProvidersExhaustedError extends PipelineError {
  readonly kind = "AllProvidersExhausted";

  constructor(readonly attempts: ProviderAttemptRecord[]) {
    super(
      attempts.length === 0
        ? "No LLM provider is available."
        : `All LLM providers failed after ${attempts.length} attempt(s); last: ${attempts[attempts.length - 1]?.provider} (${attempts[attempts.length - 1]?.message})`
    );
    this.name = "AllProvidersExhaustedError";
  }
}

export class JsonRecoveryFailedError extends PipelineError {
  readonly kind = "JsonRecoveryFailed";

  constructor(readonly rawText: string) {
    super(rawText.trim() ? "Model response did not contain valid JSON." : "Model returned an empty response.");
    this.name = "JsonRecoveryFailedError";
  }
}

export class PdfExtractionFailedError extends PipelineError {
  readonly kind = "PdfExtractionFailed";

  constructor(
    readonly filePath: string,
    reason: string
  ) {
    super(`Could not extract text from ${filePath}: ${reason}`);
    this.name = "PdfExtractionFailedError";
  }
}

export class ValidationFailedError extends PipelineError {
  readonly kind = "ValidationFailed";

  constructor(readonly violations: string[]) {
    super(`Question rejected: ${violations.join("; ")}`);
    this.name = "ValidationFailedError";
  }
}

export class CancelledError extends PipelineError {
  readonly kind = "Cancelled";

  constructor(stage: string) {
    super(`${stage} was cancelled.`);
    this.name = "CancelledError";
  }
}

export class DependencyMissingError extends PipelineError {
  readonly kind = "DependencyMissing";

  constructor(message: string) {
    super(message);
    this.name = "DependencyMissingError";
  }
}

export class GenerationFailedError extends PipelineError {
  readonly kind = "GenerationFailed";

  constructor(message: string) {
    super(message);
    this.name = "GenerationFailedError";
  }
}

export type TerminalFailure =
  | AllProvidersExhaustedError
  | PdfExtractionFailedError
  | DependencyMissingError
  | CancelledError
  | GenerationFailedError;

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

export function formatError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return "Unknown runtime error.";
}
