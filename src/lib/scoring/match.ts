import { scoreSkills, scoreTitle } from "./fit.ts";
import { scoreLocation } from "./location.ts";
import { DEFAULT_MAX_DAYS, parsePublishedAt, scoreRecency } from "./recency.ts";
import { scoreSeniority } from "./seniority.ts";
import { containsAny, normalize, tokenize } from "./tokenize.ts";
import type { JobListing, ScoringOptions, UserProfile } from "../types.ts";

export const MATCH_WEIGHTS = {
  title: 3,
  skills: 3,
  location: 1.5,
  seniority: 1,
  recency: 1,
} as const;

export const BAD_KEYWORD_PENALTY = 0.3;

type SubScores = Record<keyof typeof MATCH_WEIGHTS, number>;

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

function roundTo(value: number, decimals: number) {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function weightedAverage(scores: SubScores) {
  const totalWeight = Object.values(MATCH_WEIGHTS).reduce(
    (sum, value) => sum + value,
    0
  );
  const weighted =
    MATCH_WEIGHTS.title * scores.title +
    MATCH_WEIGHTS.skills * scores.skills +
    MATCH_WEIGHTS.location * scores.location +
    MATCH_WEIGHTS.seniority * scores.seniority +
    MATCH_WEIGHTS.recency * scores.recency;
  return weighted / totalWeight;
}

/**
 * Scores how well a job fits a profile, from 0 to 1 rounded to 4 decimals.
 *
 * Missing or malformed fields fall back to neutral sub-scores instead of
 * throwing. `options.now` pins the clock used for recency.
 */
export function computeMatchScore(
  job: JobListing,
  profile: UserProfile,
  options: ScoringOptions = {}
): number {
  const title = normalize(job.title);
  const description = normalize(job.description);
  const publishedAt = parsePublishedAt(job.publishedAt, options.onMalformedInput);

  const targetRoles = profile.targetRoles ?? [];
  const skills = profile.skills ?? [];
  const badKeywords = profile.badKeywords ?? [];

  const titleTokens = tokenize(title);
  const allTokens = new Set([...titleTokens, ...tokenize(description)]);

  const baseScore = weightedAverage({
    title: scoreTitle(titleTokens, targetRoles),
    skills: scoreSkills(allTokens, skills),
    location: scoreLocation(
      job.location,
      profile.preferredLocations ?? [],
      profile.remoteOnly ?? false
    ),
    seniority: scoreSeniority(title, profile.seniorityPreference),
    recency: scoreRecency(
      publishedAt,
      options.maxDays ?? DEFAULT_MAX_DAYS,
      options.now ?? new Date()
    ),
  });

  const penalized =
    badKeywords.length > 0 && containsAny(`${title} ${description}`, badKeywords)
      ? baseScore * BAD_KEYWORD_PENALTY
      : baseScore;

  return roundTo(clamp(penalized, 0, 1), 4);
}
