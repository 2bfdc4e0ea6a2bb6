const STOP_WORDS = new Set([
  "about",
  "after",
  "again",
  "because",
  "before",
  "between",
  "could",
  "every",
  "first",
  "from",
  "have",
  "into",
  "page",
  "more",
  "must",
  "only",
  "other",
  "should",
  "that",
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
  "with",
  "would"
]);

export function normalizeWhitespace(value: string): string {
  return value.replace(/\r/g, "\n").replace(/\t/g, " ").replace(/ {2,}/g, " ").trim();
}

export function extractKeywords(text: string, maxCount: number): string[] {
  const frequency = new Map<string, number>();
  const normalized = normalizeWhitespace(text).toLowerCase();
  const tokens = normalized
    .replace(/[^a-z0-9\s-]/g, " ")
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length >= 4 && !STOP_WORDS.has(token));

  for (const token of tokens) {
    frequency.set(token, (frequency.get(token) ?? 0) + 1);
  }

  return [...frequency.entries()]
    .sort((left, right) => right[1] - left[1])
    .slice(0, maxCount)
    .map(([keyword]) => keyword);
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
