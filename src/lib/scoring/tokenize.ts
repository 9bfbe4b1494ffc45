const WORD_PATTERN = /[a-zA-Z0-9]+/g;

export function normalize(text: string | null | undefined): string {
  if (!text) return "";
  return text.toLowerCase();
}

export function tokenize(text: string | null | undefined): Set<string> {
  const matches = (text ?? "").match(WORD_PATTERN) ?? [];
  return new Set(matches.map((token) => token.toLowerCase()));
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  const haystack = normalize(text);
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

// Keywords are matched against single-word tokens, so a phrase never counts.
export function countKeywords(
  tokens: ReadonlySet<string>,
  keywords: readonly string[]
): number {
  const uniqueKeywords = new Set(keywords.map((keyword) => keyword.toLowerCase()));
  let count = 0;
  for (const keyword of uniqueKeywords) {
    if (tokens.has(keyword)) count += 1;
  }
  return count;
}
