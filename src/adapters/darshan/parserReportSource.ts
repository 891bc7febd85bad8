import { createReadStream } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import type { TraceReportSource } from "../../core/interfaces.js";
import type { ReportText, TraceReports } from "../../core/types.js";
import {
  type CommandRunner,
  describeCommandFailure,
  spawnToFile,
} from "./commandRunner.js";

export const DEFAULT_PARSER_BIN = "darshan-parser";

export const SCRATCH_FILES = {
  totals: "parsed_total.txt",
  perf: "parsed_perf.txt",
  full: "parsed_full.txt",
  layout: "parsed_lustre.txt",
} as const;

const LUSTRE_RECORD_PREFIX = "LUSTRE";

export interface DarshanParserReportSourceOptions {
  scratchDir: string;
  parserBin?: string;
  runCommand?: CommandRunner;
}

/**
 * Keeps tab-separated fields 4-5 (counter name, value) of a `LUSTRE` record
 * from the full parser dump; other lines yield `null`.
 */
export function extractLustreRecord(line: string): string | null {
  if (!line.startsWith(LUSTRE_RECORD_PREFIX)) {
    return null;
  }

  const record = line.split("\t").slice(3, 5).join("\t");
  return record || null;
}

async function filterLustreRecords(
  sourcePath: string,
  targetPath: string,
): Promise<string> {
  const records: string[] = [];
  const reader = createInterface({
    input: createReadStream(sourcePath, { encoding: "utf-8" }),
    crlfDelay: Number.POSITIVE_INFINITY,
  });

  for await (const line of reader) {
    const record = extractLustreRecord(line);
    if (record !== null) {
      records.push(`${record}\n`);
    }
  }

  const text = records.join("");
  await writeFile(targetPath, text, "utf-8");
  return text;
}

export class DarshanParserReportSource implements TraceReportSource {
  private readonly scratchDir: string;
  private readonly parserBin: string;
  private readonly runCommand: CommandRunner;

  constructor(options: DarshanParserReportSourceOptions) {
    this.scratchDir = options.scratchDir;
    this.parserBin = options.parserBin ?? DEFAULT_PARSER_BIN;
    this.runCommand = options.runCommand ?? spawnToFile;
  }

  async readReports(tracePath: string): Promise<TraceReports> {
    const totals = await this.runReport(
      ["--total", tracePath],
      SCRATCH_FILES.totals,
    );
    if (!totals.ok) {
      const skipped: ReportText = {
        ok: false,
        error: "not run: totals report failed",
      };
      return { totals, perf: skipped, layout: skipped };
    }

    const perf = await this.runReport(
      ["--perf", tracePath],
      SCRATCH_FILES.perf,
    );
    const layout = await this.readLayout(tracePath);

    return { totals, perf, layout };
  }

  private async runReport(
    args: string[],
    fileName: string,
  ): Promise<ReportText> {
    const outputPath = join(this.scratchDir, fileName);
    const result = this.runCommand(this.parserBin, args, outputPath);
    const failure = describeCommandFailure(this.parserBin, args, result);
    if (failure) {
      return { ok: false, error: failure };
    }

    return { ok: true, text: await readFile(outputPath, "utf-8") };
  }

  private async readLayout(tracePath: string): Promise<ReportText> {
    const args = [tracePath];
    const fullPath = join(this.scratchDir, SCRATCH_FILES.full);
    const result = this.runCommand(this.parserBin, args, fullPath);
    const failure = describeCommandFailure(this.parserBin, args, result);
    if (failure) {
      return { ok: false, error: failure };
    }

    const layoutPath = join(this.scratchDir, SCRATCH_FILES.layout);
    const text = await filterLustreRecords(fullPath, layoutPath);
    return { ok: true, text };
  }
}
