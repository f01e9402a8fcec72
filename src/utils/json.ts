import { JsonRecoveryFailedError } from "../domain/errors.js";

export type JsonShape = "array" | "object";

/**
 * Recovers the JSON value a model meant to return. Tries the longest fenced block,
 * then the whole body, then the first balanced array or object (`prefer` decides
 * which delimiter is scanned for first).
 */
export function parseJsonFromModelText(raw: string, prefer: JsonShape = "array"): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new JsonRecoveryFailedError(raw);
  }

  const fenced = extractLongestFence(trimmed);
  if (fenced !== null) {
    const value = tryParse(fenced);
    if (value.ok) {
      return value.value;
    }
  }

  const whole = tryParse(trimmed);
  if (whole.ok) {
    return whole.value;
  }

  const order: JsonShape[] = prefer === "array" ? ["array", "object"] : ["object", "array"];
  for (const shape of order) {
    const candidate = shape === "array" ? scanBalanced(trimmed, "[", "]") : scanBalanced(trimmed, "{", "}");
    if (candidate.ok) {
      return candidate.value;
    }
  }

  throw new JsonRecoveryFailedError(raw);
}

function extractLongestFence(text: string): string | null {
  const pattern = /```([a-zA-Z]*)[ \t]*\r?\n?([\s\S]*?)```/g;
  let longest: string | null = null;

  for (const match of text.matchAll(pattern)) {
    const label = match[1]?.toLowerCase() ?? "";
    if (label !== "" && label !== "json") {
      continue;
    }
    const body = match[2]?.trim() ?? "";
    if (longest === null || body.length > longest.length) {
      longest = body;
    }
  }

  return longest;
}

type ParseOutcome = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseOutcome {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

// Walks every opening delimiter left to right; returns the first one whose
// balanced span parses.
function scanBalanced(text: string, open: string, close: string): ParseOutcome {
  for (let start = text.indexOf(open); start !== -1; start = text.indexOf(open, start + 1)) {
    const end = findBalancedEnd(text, start, open, close);
    if (end === -1) {
      continue;
    }
    const parsed = tryParse(text.slice(start, end + 1));
    if (parsed.ok) {
      return parsed;
    }
  }
  return { ok: false };
}

function findBalancedEnd(text: string, start: number, open: string, close: string): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const character = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (character === "\\") {
        escaped = true;
      } else if (character === '"') {
        inString = false;
      }
      continue;
    }

    if (character === '"') {
      inString = true;
    } else if (character === open) {
      depth += 1;
    } else if (character === close) {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
}

export function asObject(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error("Expected a JSON object.");
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value.trim() : fallback;
}

export function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => (typeof item === "string" ? item.trim() : ""))
    .filter((item) => item.length > 0);
}

export function asObjectArray(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isRecord);
}

/** Accepts either a bare array or an object wrapping one under `key`. */
export function unwrapArray(value: unknown, key: string): Record<string, unknown>[] {
  if (Array.isArray(value)) {
    return asObjectArray(value);
  }
  if (isRecord(value)) {
    return asObjectArray(value[key]);
  }
  return [];
}
