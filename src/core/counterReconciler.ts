import type { CounterResolution, CounterSet } from "./types.js";

export interface ResolutionStrategy {
  name: string;
  candidateKey(column: string): string;
}

export const EXACT_MATCH: ResolutionStrategy = {
  name: "exact",
  candidateKey: (column) => column,
};

export const TOTAL_PREFIX_MATCH: ResolutionStrategy = {
  name: "total-prefix",
  candidateKey: (column) => `total_${column}`,
};

/** Tried in order; the first strategy whose key exists wins. */
export const DEFAULT_RESOLUTION_STRATEGIES: readonly ResolutionStrategy[] = [
  EXACT_MATCH,
  TOTAL_PREFIX_MATCH,
];

export function resolveCounter(
  column: string,
  counters: CounterSet,
  strategies: readonly ResolutionStrategy[] = DEFAULT_RESOLUTION_STRATEGIES,
): CounterResolution | null {
  for (const strategy of strategies) {
    const key = strategy.candidateKey(column);
    const value = counters.get(key);
    if (value !== undefined) {
      return {
        key,
        value,
        strategy: strategy.name,
      };
    }
  }

  return null;
}
