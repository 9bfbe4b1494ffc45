import { z } from "zod";

import type { JobRecord, UserProfile } from "./types.ts";

const keywordList = z.array(z.string()).nullish().transform((value) => value ?? []);

export const jobRecordSchema = z
  .object({
    title: z.string(),
    company: z.string(),
    url: z.string(),
    source: z.string(),
    source_id: z.string(),
    location: z.string().nullish(),
    description: z.string().nullish(),
    // Left unparsed: the scorer degrades unreadable timestamps to absent.
    published_at: z.union([z.string(), z.date()]).nullish(),
  })
  .transform(
    (job): JobRecord => ({
      title: job.title,
      company: job.company,
      url: job.url,
      source: job.source,
      sourceId: job.source_id,
      location: job.location ?? null,
      description: job.description ?? null,
      publishedAt: job.published_at ?? null,
    })
  );

export const userProfileSchema = z
  .object({
    full_name: z.string().nullish(),
    target_roles: keywordList,
    skills: keywordList,
    preferred_locations: keywordList,
    bad_keywords: keywordList,
    remote_only: z
      .union([z.boolean(), z.literal(0), z.literal(1)])
      .nullish()
      .transform((value) => Boolean(value)),
    seniority_preference: z.string().nullish(),
  })
  .transform(
    (profile): UserProfile => ({
      fullName: profile.full_name ?? null,
      targetRoles: profile.target_roles,
      skills: profile.skills,
      preferredLocations: profile.preferred_locations,
      badKeywords: profile.bad_keywords,
      remoteOnly: profile.remote_only,
      seniorityPreference: profile.seniority_preference ?? null,
    })
  );

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

export function parseJobRecord(input: unknown): ParseResult<JobRecord> {
  const parsed = jobRecordSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }
  return { success: true, data: parsed.data };
}

export function parseUserProfile(input: unknown): ParseResult<UserProfile> {
  const parsed = userProfileSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }
  return { success: true, data: parsed.data };
}

export function formatSchemaError(error: z.ZodError) {
  const fields = Array.from(
    new Set(error.issues.map((issue) => issue.path.join(".") || "(root)"))
  );
  return `Invalid payload. Check: ${fields.join(", ")}.`;
}
