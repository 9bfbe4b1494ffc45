export { computeMatchScore, MATCH_WEIGHTS, BAD_KEYWORD_PENALTY } from "./lib/scoring/match.ts";
export { getDefaultScoringOptions, rankJobs, scoreJobs } from "./lib/scoring/rank.ts";
export { scoreSkills, scoreTitle } from "./lib/scoring/fit.ts";
export { isRemoteLocation, scoreLocation } from "./lib/scoring/location.ts";
export {
  DEFAULT_MAX_DAYS,
  getAgeDays,
  parseIsoTimestamp,
  parsePublishedAt,
  scoreRecency,
} from "./lib/scoring/recency.ts";
export {
  extractSeniority,
  scoreSeniority,
  seniorityToOrdinal,
} from "./lib/scoring/seniority.ts";
export { containsAny, countKeywords, normalize, tokenize } from "./lib/scoring/tokenize.ts";
export {
  formatSchemaError,
  jobRecordSchema,
  parseJobRecord,
  parseUserProfile,
  userProfileSchema,
  type ParseResult,
} from "./lib/schemas.ts";
export { EnvError, formatEnvError, getEnv, parseEnv, type Env } from "./lib/env.ts";
export {
  createMalformedInputCounter,
  warnMalformedInput,
  type MalformedInputCounter,
} from "./lib/observability.ts";
export type * from "./lib/types.ts";
