import { basename } from "node:path";
import type {
  FeatureTableSink,
  FeatureTableSinkFactory,
  RunLog,
  TraceDiscovery,
  TraceReportSource,
} from "./interfaces.js";
import {
  createMissingCounterTally,
  rankMissingColumns,
  recordMissingColumns,
} from "./missingTally.js";
import { PERF_COUNTER_KEY, parseTraceReports } from "./reportParser.js";
import { LABEL_COLUMN, buildFeatureRow } from "./rowBuilder.js";
import type {
  CorpusRunResult,
  Schema,
  SkippedTraceFile,
  TraceParseOutcome,
} from "./types.js";

export interface CorpusRunOptions {
  inputDir: string;
  output: string;
  schema: Schema;
  reportSource: TraceReportSource;
  openSink: FeatureTableSinkFactory;
  discover: TraceDiscovery;
  log?: RunLog;
  logMissing?: boolean;
  topMissing?: number;
  now?: () => Date;
}

const MAX_LISTED_MISSING = 10;
const DEFAULT_TOP_MISSING = 20;
const RULE = "=".repeat(60);

function defaultLog(line: string): void {
  process.stdout.write(`${line}\n`);
}

function describeMissing(column: string): string {
  return column === LABEL_COLUMN ? `${column} (${PERF_COUNTER_KEY})` : column;
}

function logMissingColumns(log: RunLog, missing: readonly string[]): void {
  log(`  Missing ${missing.length} counters (set to 0):`);
  for (const column of missing.slice(0, MAX_LISTED_MISSING)) {
    log(`    - ${describeMissing(column)}`);
  }
  if (missing.length > MAX_LISTED_MISSING) {
    log(`    ... and ${missing.length - MAX_LISTED_MISSING} more`);
  }
}

/**
 * Runs every discovered trace through parse, reconcile, normalize and row
 * building, streaming each row to the sink before the next trace is read.
 * A trace whose totals report is unavailable is skipped; the run continues.
 * The sink is only opened once at least one trace was discovered.
 */
export async function runCorpus(
  options: CorpusRunOptions,
): Promise<CorpusRunResult> {
  const log = options.log ?? defaultLog;
  const logMissing = options.logMissing ?? true;
  const generatedAtUtc = (options.now?.() ?? new Date()).toISOString();

  const traceFiles = await options.discover(options.inputDir);
  if (traceFiles.length === 0) {
    log(`No .darshan files found in ${options.inputDir}`);
    return {
      generatedAtUtc,
      inputDir: options.inputDir,
      output: null,
      discoveredFileCount: 0,
      processedFileCount: 0,
      skippedFiles: [],
      missingCounters: [],
    };
  }

  log(`Found ${traceFiles.length} Darshan files to process`);

  const tally = createMissingCounterTally();
  const skippedFiles: SkippedTraceFile[] = [];
  let processedFileCount = 0;

  const sink: FeatureTableSink = await options.openSink(
    options.output,
    options.schema,
  );
  try {
    for (const [index, tracePath] of traceFiles.entries()) {
      log("");
      const position = `${index + 1}/${traceFiles.length}`;
      log(`Processing ${position}: ${basename(tracePath)}`);

      let outcome: TraceParseOutcome;
      try {
        const reports = await options.reportSource.readReports(tracePath);
        outcome = parseTraceReports(reports);
      } catch (error) {
        outcome = {
          ok: false,
          reason: error instanceof Error ? error.message : String(error),
        };
      }

      if (!outcome.ok) {
        skippedFiles.push({ path: tracePath, message: outcome.reason });
        log(`  Skipping due to parse error: ${outcome.reason}`);
        continue;
      }

      const built = buildFeatureRow(options.schema, outcome.counters);
      await sink.writeRow(built.row);
      recordMissingColumns(tally, built.missing);
      processedFileCount += 1;

      if (logMissing && built.missing.length > 0) {
        logMissingColumns(log, built.missing);
      }
      log(`  Found ${built.found.length} counters successfully`);
      log("  Processed successfully");
    }
  } finally {
    await sink.close();
  }

  const missingCounters = rankMissingColumns(tally);

  log("");
  log(RULE);
  log(`Output written to ${options.output}`);
  log(
    `Processed ${processedFileCount}/${traceFiles.length} files ` +
      `(${skippedFiles.length} skipped)`,
  );

  if (missingCounters.length > 0) {
    log("");
    log("Global Missing Counter Summary:");
    log("  (Number shows how many files were missing each counter)");
    const listed = Math.max(0, options.topMissing ?? DEFAULT_TOP_MISSING);
    for (const entry of missingCounters.slice(0, listed)) {
      const share = `${entry.missingCount}/${traceFiles.length}`;
      log(`    ${describeMissing(entry.column)}: missing in ${share} files`);
    }
  }

  return {
    generatedAtUtc,
    inputDir: options.inputDir,
    output: options.output,
    discoveredFileCount: traceFiles.length,
    processedFileCount,
    skippedFiles,
    missingCounters,
  };
}
