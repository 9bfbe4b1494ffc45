import { getEnv } from "../env.ts";
import { warnMalformedInput } from "../observability.ts";
import { computeMatchScore } from "./match.ts";
import type {
  JobListing,
  RankOptions,
  ScoredJob,
  ScoringOptions,
  UserProfile,
} from "../types.ts";

export function getDefaultScoringOptions(): ScoringOptions {
  const env = getEnv();
  return {
    maxDays: env.MATCH_RECENCY_MAX_DAYS,
    onMalformedInput: env.MATCH_WARN_MALFORMED_INPUT ? warnMalformedInput : undefined,
  };
}

export function scoreJobs<J extends JobListing>(
  jobs: J[],
  profile: UserProfile,
  options: ScoringOptions = {}
): ScoredJob<J>[] {
  const batchOptions = { ...options, now: options.now ?? new Date() };
  return jobs.map((job) => ({
    ...job,
    matchScore: computeMatchScore(job, profile, batchOptions),
  }));
}

/** Best matches first; equal scores keep their input order. */
export function rankJobs<J extends JobListing>(
  jobs: J[],
  profile: UserProfile,
  options: RankOptions = {}
): ScoredJob<J>[] {
  const { minScore, limit, ...scoringOptions } = options;
  const ranked = scoreJobs(jobs, profile, scoringOptions)
    .filter((job) => minScore === undefined || job.matchScore >= minScore)
    .sort((a, b) => b.matchScore - a.matchScore);

  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
}
