/** Counter name to raw report value, built fresh for each trace. */
export type CounterSet = Map<string, string>;

/** Ordered output column names; the order is the output order. */
export type Schema = readonly string[];

export type FeatureRow = number[];

/** Schema column to the number of traces where it could not be resolved. */
export type MissingCounterTally = Map<string, number>;

export type ReportModule = "POSIX" | "MPI-IO" | "STDIO";

export type ReportKind = "totals" | "perf" | "layout";

export type ReportText =
  | {
      ok: true;
      text: string;
    }
  | {
      ok: false;
      error: string;
    };

export interface TraceReports {
  totals: ReportText;
  perf: ReportText;
  layout: ReportText;
}

export type TraceParseOutcome =
  | {
      ok: true;
      counters: CounterSet;
      unavailableSections: ReportKind[];
    }
  | {
      ok: false;
      reason: string;
    };

export interface CounterResolution {
  key: string;
  value: string;
  strategy: string;
}

export interface BuiltFeatureRow {
  row: FeatureRow;
  found: string[];
  missing: string[];
}

export interface MissingCounterCount {
  column: string;
  missingCount: number;
}

export interface SkippedTraceFile {
  path: string;
  message: string;
}

export interface CorpusRunResult {
  generatedAtUtc: string;
  inputDir: string;
  output: string | null;
  discoveredFileCount: number;
  processedFileCount: number;
  skippedFiles: SkippedTraceFile[];
  missingCounters: MissingCounterCount[];
}
