import { normalize } from "./tokenize.ts";
import type { SeniorityLevel } from "../types.ts";

type SeniorityRule = {
  level: SeniorityLevel;
  markers: string[];
};

// Order matters: the first rule with a marker in the title wins.
const SENIORITY_RULES: SeniorityRule[] = [
  { level: "intern", markers: ["intern", "trainee"] },
  { level: "junior", markers: ["junior", " jr ", " jr."] },
  { level: "lead", markers: ["lead", "staff", "principal"] },
  { level: "senior", markers: ["senior", " sr ", " sr."] },
  { level: "mid", markers: ["mid", "middle"] },
];

const SENIORITY_ORDINALS: Record<SeniorityLevel, number> = {
  intern: 0,
  junior: 1,
  mid: 2,
  senior: 3,
  lead: 4,
  principal: 4,
};

const NEUTRAL_SCORE = 0.5;

function isSeniorityLevel(value: string): value is SeniorityLevel {
  return Object.prototype.hasOwnProperty.call(SENIORITY_ORDINALS, value);
}

export function extractSeniority(title: string | null | undefined): SeniorityLevel | null {
  const normalizedTitle = normalize(title);
  const rule = SENIORITY_RULES.find((candidate) =>
    candidate.markers.some((marker) => normalizedTitle.includes(marker))
  );
  return rule?.level ?? null;
}

/** Returns null when the level is absent or not a known seniority. */
export function seniorityToOrdinal(level: string | null | undefined): number | null {
  if (!level || !isSeniorityLevel(level)) return null;
  return SENIORITY_ORDINALS[level];
}

export function scoreSeniority(
  title: string | null | undefined,
  preference: string | null | undefined
): number {
  if (!preference) return NEUTRAL_SCORE;

  const jobOrdinal = seniorityToOrdinal(extractSeniority(title));
  const preferredOrdinal = seniorityToOrdinal(preference);
  if (jobOrdinal === null || preferredOrdinal === null) return NEUTRAL_SCORE;

  const diff = Math.abs(jobOrdinal - preferredOrdinal);
  if (diff === 0) return 1;
  if (diff === 1) return 0.7;
  if (diff === 2) return 0.4;
  return 0.1;
}
