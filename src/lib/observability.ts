import type { MalformedInputEvent, MalformedInputHook } from "./types.ts";

const LOG_TAG = "[match-score]";

function describeValue(value: unknown) {
  if (value instanceof Date) return "Invalid Date";
  return JSON.stringify(value) ?? String(value);
}

export function warnMalformedInput(event: MalformedInputEvent) {
  console.warn(
    `${LOG_TAG} Ignoring malformed ${event.field}: ${describeValue(event.value)}`
  );
}

export type MalformedInputCounter = {
  hook: MalformedInputHook;
  count(field?: MalformedInputEvent["field"]): number;
  reset(): void;
};

/** Counts malformed fields seen by the scorer, e.g. for a metrics gauge. */
export function createMalformedInputCounter(): MalformedInputCounter {
  const counts = new Map<MalformedInputEvent["field"], number>();

  return {
    hook: (event) => {
      counts.set(event.field, (counts.get(event.field) ?? 0) + 1);
    },
    count: (field) => {
      if (field) return counts.get(field) ?? 0;
      let total = 0;
      for (const value of counts.values()) total += value;
      return total;
    },
    reset: () => counts.clear(),
  };
}
