import { normalize } from "./tokenize.ts";

const UNKNOWN_LOCATION_SCORE = 0.2;

export function isRemoteLocation(location: string | null | undefined): boolean {
  return normalize(location).includes("remote");
}

export function scoreLocation(
  jobLocation: string | null | undefined,
  preferredLocations: readonly string[],
  remoteOnly: boolean
): number {
  const location = normalize(jobLocation);
  if (!location) return UNKNOWN_LOCATION_SCORE;

  const isRemote = isRemoteLocation(location);

  if (remoteOnly && !isRemote) return 0;

  if (preferredLocations.length > 0) {
    const preferred = preferredLocations.some(
      (candidate) => candidate.length > 0 && location.includes(candidate.toLowerCase())
    );
    if (preferred) return 1;
    if (remoteOnly && isRemote) return 0.8;
    return isRemote ? 0.3 : 0.1;
  }

  return isRemote ? 0.6 : 0.4;
}
