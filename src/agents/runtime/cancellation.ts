import { AllProvidersExhaustedError, CancelledError } from "../../domain/errors.js";

export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CancelledError(stage);
  }
}

/** Failures that stop a running stage and surface as its terminal failure. */
export function isStageTerminal(error: unknown): error is CancelledError | AllProvidersExhaustedError {
  return error instanceof CancelledError || error instanceof AllProvidersExhaustedError;
}
