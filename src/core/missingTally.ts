import type { MissingCounterCount, MissingCounterTally } from "./types.js";

export function createMissingCounterTally(): MissingCounterTally {
  return new Map();
}

export function recordMissingColumns(
  tally: MissingCounterTally,
  missing: readonly string[],
): MissingCounterTally {
  for (const column of missing) {
    tally.set(column, (tally.get(column) ?? 0) + 1);
  }
  return tally;
}

/** Columns by miss count, highest first; ties keep first-seen order. */
export function rankMissingColumns(
  tally: MissingCounterTally,
  limit?: number,
): MissingCounterCount[] {
  const ranked = [...tally.entries()]
    .map(([column, missingCount]) => ({ column, missingCount }))
    .sort((left, right) => right.missingCount - left.missingCount);

  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
}
