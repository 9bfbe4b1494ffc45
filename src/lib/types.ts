export type SeniorityLevel =
  | "intern"
  | "junior"
  | "mid"
  | "senior"
  | "lead"
  | "principal";

export type JobListing = {
  title: string;
  description?: string | null;
  location?: string | null;
  publishedAt?: Date | string | null;
};

export type JobRecord = JobListing & {
  company: string;
  url: string;
  source: string;
  sourceId: string;
};

export type UserProfile = {
  fullName?: string | null;
  targetRoles?: string[];
  skills?: string[];
  preferredLocations?: string[];
  remoteOnly?: boolean;
  seniorityPreference?: string | null;
  badKeywords?: string[];
};

export type MalformedInputEvent = {
  field: "publishedAt";
  value: unknown;
};

export type MalformedInputHook = (event: MalformedInputEvent) => void;

export type ScoringOptions = {
  now?: Date;
  maxDays?: number;
  onMalformedInput?: MalformedInputHook;
};

export type ScoredJob<J extends JobListing = JobListing> = J & {
  matchScore: number;
};

export type RankOptions = ScoringOptions & {
  minScore?: number;
  limit?: number;
};
