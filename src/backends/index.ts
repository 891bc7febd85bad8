import type { CommandRunner } from "../adapters/darshan/commandRunner.js";
import {
  DarshanParserReportSource,
} from "../adapters/darshan/parserReportSource.js";
import {
  defaultScratchDir,
  withScratchDir,
} from "../adapters/darshan/scratchDir.js";
import { runCorpus } from "../core/corpusDriver.js";
import type { RunLog } from "../core/interfaces.js";
import type { CorpusRunResult } from "../core/types.js";
import { openFileFeatureTableSink } from "./local/csvTableSink.js";
import { readSchemaHeader } from "./local/schemaSource.js";
import { findTraceFiles } from "./local/traceDiscovery.js";

export interface ProcessDarshanCorpusOptions {
  inputDir: string;
  output: string;
  schemaPath: string;
  scratchDir?: string;
  parserBin?: string;
  runCommand?: CommandRunner;
  log?: RunLog;
  logMissing?: boolean;
  topMissing?: number;
}

/**
 * Reads the schema once, then runs the corpus through darshan-parser with its
 * reports materialized in a scratch directory that is removed afterwards.
 */
export async function processDarshanCorpus(
  options: ProcessDarshanCorpusOptions,
): Promise<CorpusRunResult> {
  const schema = await readSchemaHeader(options.schemaPath);
  const scratchRoot = options.scratchDir ?? defaultScratchDir();

  return withScratchDir(scratchRoot, (scratchDir) =>
    runCorpus({
      inputDir: options.inputDir,
      output: options.output,
      schema,
      reportSource: new DarshanParserReportSource({
        scratchDir,
        parserBin: options.parserBin,
        runCommand: options.runCommand,
      }),
      openSink: openFileFeatureTableSink,
      discover: findTraceFiles,
      log: options.log,
      logMissing: options.logMissing,
      topMissing: options.topMissing,
    }),
  );
}

export {
  createCsvTableSink,
  openFileFeatureTableSink,
} from "./local/csvTableSink.js";
export {
  findTraceFiles,
  TRACE_FILE_EXTENSION,
} from "./local/traceDiscovery.js";
export {
  parseSchemaHeader,
  readSchemaHeader,
} from "./local/schemaSource.js";
