import { DEFAULT_PARSER_BIN } from "../adapters/darshan/parserReportSource.js";
import { defaultScratchDir } from "../adapters/darshan/scratchDir.js";

export interface RunCommandOptions {
  inputDir: string;
  output: string;
  schemaPath: string;
  scratchDir: string;
  parserBin: string;
  logMissing: boolean;
  topMissing: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const DEFAULT_TOP_MISSING = 20;


function flagFromEnv(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

function parseTopMissing(raw: string | undefined, source: string): number {
  const parsed = Number(raw);
  if (!raw?.trim() || !Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`Invalid ${source} value: ${raw ?? "(missing)"}`);
  }
  return parsed;
}

function topMissingFromEnv(env: NodeJS.ProcessEnv): number {
  const raw = env.DARSHAN_FEATURES_TOP_MISSING;
  return raw
    ? parseTopMissing(raw, "DARSHAN_FEATURES_TOP_MISSING")
    : DEFAULT_TOP_MISSING;
}

export function usageLines(): string[] {
  return [
    "darshan-features - Darshan trace counters to a normalized feature table",
    "",
    "Usage:",
    "  darshan-features run <input_dir> <output_table> <schema_source>",
    "                       [scratch_dir] [options]",
    "",
    "Parses every *.darshan file under <input_dir> with darshan-parser and",
    "writes one log10(x+1)-normalized row per trace to the local CSV file",
    "<output_table>, in the column order of the header of <schema_source>.",
    "",
    "Environment variables:",
    "  DARSHAN_FEATURES_PARSER_BIN    darshan-parser executable",
    "                                 (default: darshan-parser)",
    "  DARSHAN_FEATURES_SCRATCH_DIR   Scratch directory",
    "                                 (default: <tmpdir>/darshan_parse_<pid>)",
    "  DARSHAN_FEATURES_QUIET         Set to 1 to omit per-file missing lists",
    "  DARSHAN_FEATURES_TOP_MISSING   Columns listed in the missing counter",
    "                                 summary (default: 20)",
    "",
    "Options:",
    "  --parser-bin <path>",
    "  --top-missing <n>",
    "  --quiet",
    "  --help",
  ];
}

/** Parses the arguments that follow `run`. */
export function parseRunArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunCommandOptions {
  const positionals: string[] = [];
  let parserBin = env.DARSHAN_FEATURES_PARSER_BIN ?? DEFAULT_PARSER_BIN;
  let logMissing = !flagFromEnv(env, "DARSHAN_FEATURES_QUIET");
  let topMissing = topMissingFromEnv(env);

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === "--parser-bin") {
      parserBin = argv[i + 1] ?? parserBin;
      i += 1;
      continue;
    }

    if (arg === "--top-missing") {
      topMissing = parseTopMissing(argv[i + 1], "--top-missing");
      i += 1;
      continue;
    }

    if (arg === "--quiet") {
      logMissing = false;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new UsageError(`Unknown arg: ${arg}`);
    }

    positionals.push(arg);
  }

  const [inputDir, output, schemaPath, scratchDir, ...extra] = positionals;
  if (!inputDir || !output || !schemaPath) {
    throw new UsageError(
      "Missing required arguments: <input_dir> <output_table> <schema_source>",
    );
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(" ")}`);
  }

  return {
    inputDir,
    output,
    schemaPath,
    scratchDir:
      scratchDir ?? env.DARSHAN_FEATURES_SCRATCH_DIR ?? defaultScratchDir(),
    parserBin,
    logMissing,
    topMissing,
  };
}
