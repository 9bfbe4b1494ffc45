import { countKeywords } from "./tokenize.ts";

const NEUTRAL_SCORE = 0.5;

function keywordCoverage(tokens: ReadonlySet<string>, keywords: readonly string[]) {
  if (keywords.length === 0) return NEUTRAL_SCORE;
  const matches = countKeywords(tokens, keywords);
  return Math.min(1, matches / Math.max(1, keywords.length));
}

export function scoreTitle(
  titleTokens: ReadonlySet<string>,
  targetRoles: readonly string[]
): number {
  return keywordCoverage(titleTokens, targetRoles);
}

/** Skills are matched against title and description tokens combined. */
export function scoreSkills(
  tokens: ReadonlySet<string>,
  skills: readonly string[]
): number {
  return keywordCoverage(tokens, skills);
}
