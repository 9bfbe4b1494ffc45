import { z } from "zod";

const envSchema = z.object({
  MATCH_RECENCY_MAX_DAYS: z
    .preprocess(
      (value) =>
        typeof value === "string" && value.length === 0 ? undefined : value,
      z.coerce.number().int().positive().optional().default(60)
    )
    .default(60),
  MATCH_WARN_MALFORMED_INPUT: z
    .preprocess((value) => (value === "true" ? true : false), z.boolean())
    .optional()
    .default(false),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export class EnvError extends Error {
  readonly invalidKeys: string[];

  constructor(invalidKeys: string[]) {
    super(`Invalid environment configuration: ${invalidKeys.join(", ")}`);
    this.name = "EnvError";
    this.invalidKeys = invalidKeys;
  }
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse({
    MATCH_RECENCY_MAX_DAYS: source.MATCH_RECENCY_MAX_DAYS,
    MATCH_WARN_MALFORMED_INPUT: source.MATCH_WARN_MALFORMED_INPUT,
  });

  if (!parsed.success) {
    const invalidKeys = parsed.error.issues
      .map((issue) => issue.path[0])
      .filter((key): key is string => typeof key === "string");
    throw new EnvError(invalidKeys);
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) return cachedEnv;
  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function formatEnvError(error: unknown) {
  if (error instanceof EnvError) {
    const suffix = error.invalidKeys.length
      ? ` Invalid: ${error.invalidKeys.join(", ")}.`
      : "";
    return `Scorer misconfigured.${suffix}`;
  }
  return "Scorer misconfigured.";
}
