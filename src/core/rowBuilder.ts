import {
  DEFAULT_RESOLUTION_STRATEGIES,
  type ResolutionStrategy,
  resolveCounter,
} from "./counterReconciler.js";
import { normalizeCounterValue } from "./normalizer.js";
import { PERF_COUNTER_KEY } from "./reportParser.js";
import type { BuiltFeatureRow, CounterSet, Schema } from "./types.js";

/** Label column of the training table, derived from POSIX throughput. */
export const LABEL_COLUMN = "tag";

export interface BuildFeatureRowOptions {
  strategies?: readonly ResolutionStrategy[];
}

export function buildFeatureRow(
  schema: Schema,
  counters: CounterSet,
  options: BuildFeatureRowOptions = {},
): BuiltFeatureRow {
  const strategies = options.strategies ?? DEFAULT_RESOLUTION_STRATEGIES;
  const row: number[] = [];
  const found: string[] = [];
  const missing: string[] = [];

  for (const column of schema) {
    if (column === LABEL_COLUMN) {
      const perf = counters.get(PERF_COUNTER_KEY);
      row.push(normalizeCounterValue(perf ?? "0"));
      (perf === undefined ? missing : found).push(column);
      continue;
    }

    const resolution = resolveCounter(column, counters, strategies);
    if (!resolution) {
      row.push(0);
      missing.push(column);
      continue;
    }

    row.push(normalizeCounterValue(resolution.value));
    found.push(column);
  }

  return {
    row,
    found,
    missing,
  };
}
