const STOP_WORDS = new Set([
  "about",
  "after",
  "again",
  "also",
  "because",
  "before",
  "between",
  "can",
  "could",
  "does",
  "every",
  "explain",
  "first",
  "from",
  "have",
  "how",
  "into",
  "lesson",
  "more",
  "must",
  "only",
  "other",
  "should",
  "tell",
  "that",
  "the",
  "their",
  "there",
  "these",
  "this",
  "those",
  "through",
  "using",
  "what",
  "when",
  "where",
  "which",
  "while",
  "who",
  "why",
  "with",
  "would",
  "you",
  "your"
]);

export function normalizeWhitespace(value: string): string {
  return value.replace(/\r/g, "\n").replace(/\t/g, " ").replace(/ {2,}/g, " ").trim();
}

export function truncate(value: string, maxChars: number): string {
  return value.length <= maxChars ? value : value.slice(0, maxChars);
}

export function extractKeywords(text: string, maxCount: number): string[] {
  const frequency = new Map<string, number>();
  const tokens = tokenize(text).filter((token) => token.length >= 4);

  for (const token of tokens) {
    frequency.set(token, (frequency.get(token) ?? 0) + 1);
  }

  return [...frequency.entries()]
    .sort((left, right) => right[1] - left[1])
    .slice(0, maxCount)
    .map(([keyword]) => keyword);
}

/** Content-bearing terms of a learner message, in order of appearance. */
export function extractQueryTerms(text: string): string[] {
  return [...new Set(tokenize(text).filter((token) => token.length >= 3))];
}

function tokenize(text: string): string[] {
  return normalizeWhitespace(text)
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, " ")
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token));
}

export function normalizeForComparison(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Jaccard overlap of the word sets of two strings, in [0, 1]. */
export function wordOverlap(left: string, right: string): number {
  const leftWords = new Set(normalizeForComparison(left).split(" ").filter(Boolean));
  const rightWords = new Set(normalizeForComparison(right).split(" ").filter(Boolean));
  if (leftWords.size === 0 || rightWords.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const word of leftWords) {
    if (rightWords.has(word)) {
      shared += 1;
    }
  }
  return shared / (leftWords.size + rightWords.size - shared);
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/--+/g, "-");
}

export function createId(prefix: string, seed: string): string {
  const slug = slugify(seed) || "item";
  return `${prefix}-${slug}`;
}
