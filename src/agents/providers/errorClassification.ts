import { APICallError } from "ai";

import { isRecord } from "../../utils/json.js";

export type ProviderErrorKind = "quota" | "transient" | "client";

const QUOTA_PATTERN = /rate.?limit|quota|resource_exhausted|too many requests/i;
const TRANSIENT_PATTERN =
  /timeout|timed out|aborted|econnreset|etimedout|econnrefused|eai_again|socket hang up|fetch failed|network error/i;

/**
 * Quota errors burn a pooled key, transient ones only rotate it, and client errors
 * move the broker straight to the next provider.
 */
export function classifyProviderError(error: unknown): ProviderErrorKind {
  const status = readStatusCode(error);
  if (status === 429 || status === 403) {
    return "quota";
  }
  if (status !== undefined && status >= 500) {
    return "transient";
  }

  const message = collectMessages(error);
  if (QUOTA_PATTERN.test(message)) {
    return "quota";
  }
  if (status !== undefined && status >= 400) {
    return "client";
  }
  if (isAbortError(error) || TRANSIENT_PATTERN.test(message)) {
    return "transient";
  }

  return "client";
}

function readStatusCode(error: unknown): number | undefined {
  if (APICallError.isInstance(error)) {
    return error.statusCode;
  }
  if (!isRecord(error)) {
    return undefined;
  }

  const status = error.statusCode ?? error.status;
  return typeof status === "number" ? status : undefined;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// Includes nested causes: undici reports ECONNRESET on `cause`, not on the outer error.
function collectMessages(error: unknown, depth = 0): string {
  if (depth > 3 || !isRecord(error)) {
    return typeof error === "string" ? error : "";
  }

  const parts = [error.message, error.code, error.name].filter((part): part is string => typeof part === "string");
  return [...parts, collectMessages(error.cause, depth + 1)].join(" ");
}
