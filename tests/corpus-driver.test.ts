import { describe, expect, it, vi } from "vitest";
import { runCorpus } from "../src/core/corpusDriver.js";
import type {
  FeatureTableSinkFactory,
  TraceReportSource,
} from "../src/core/interfaces.js";
import type { TraceReports } from "../src/core/types.js";

const SCHEMA = ["nprocs", "POSIX_OPENS", "tag"];

const REPORTS: Record<string, TraceReports> = {
  "/traces/a.darshan": {
    totals: { ok: true, text: "# nprocs: 9\ntotal_POSIX_OPENS: 99\n" },
    perf: {
      ok: true,
      text: "# POSIX module data\n# agg_perf_by_slowest: 9 # MiB/s\n",
    },
    layout: { ok: true, text: "" },
  },
  "/traces/b.darshan": {
    totals: { ok: false, error: "exit 1" },
    perf: { ok: false, error: "not run" },
    layout: { ok: false, error: "not run" },
  },
  "/traces/nested/c.darshan": {
    totals: { ok: true, text: "total_POSIX_OPENS: 0\n" },
    perf: { ok: false, error: "exit 1" },
    layout: { ok: false, error: "exit 1" },
  },
};

interface Harness {
  events: string[];
  rows: number[][];
  headers: string[][];
  lines: string[];
  source: TraceReportSource;
  openSink: FeatureTableSinkFactory;
}

function harness(reports: Record<string, TraceReports> = REPORTS): Harness {
  const events: string[] = [];
  const rows: number[][] = [];
  const headers: string[][] = [];
  const lines: string[] = [];

  return {
    events,
    rows,
    headers,
    lines,
    source: {
      async readReports(tracePath) {
        events.push(`read ${tracePath}`);
        const found = reports[tracePath];
        if (!found) {
          throw new Error(`no reports for ${tracePath}`);
        }
        return found;
      },
    },
    async openSink(destination, header) {
      events.push(`open ${destination}`);
      headers.push([...header]);
      return {
        async writeRow(row) {
          events.push("write");
          rows.push([...row]);
        },
        async close() {
          events.push("close");
        },
      };
    },
  };
}

describe("runCorpus", () => {
  it("skips traces whose totals report fails and keeps the rest", async () => {
    const h = harness();

    const result = await runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: h.openSink,
      discover: async () => Object.keys(REPORTS),
      log: (line) => h.lines.push(line),
      now: () => new Date("2026-03-01T00:00:00.000Z"),
    });

    expect(h.headers).toEqual([SCHEMA]);
    expect(h.rows).toEqual([
      [1, 2, 1],
      [0, 0, 0],
    ]);
    expect(result).toEqual({
      generatedAtUtc: "2026-03-01T00:00:00.000Z",
      inputDir: "/traces",
      output: "/out/features.csv",
      discoveredFileCount: 3,
      processedFileCount: 2,
      skippedFiles: [
        {
          path: "/traces/b.darshan",
          message: "totals report unavailable: exit 1",
        },
      ],
      missingCounters: [
        { column: "nprocs", missingCount: 1 },
        { column: "tag", missingCount: 1 },
      ],
    });
  });

  it("writes each row before reading the next trace", async () => {
    const h = harness();

    await runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: h.openSink,
      discover: async () => Object.keys(REPORTS),
      log: () => undefined,
    });

    expect(h.events).toEqual([
      "open /out/features.csv",
      "read /traces/a.darshan",
      "write",
      "read /traces/b.darshan",
      "read /traces/nested/c.darshan",
      "write",
      "close",
    ]);
  });

  it("logs progress, skips and the missing counter summary", async () => {
    const h = harness();

    await runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: h.openSink,
      discover: async () => Object.keys(REPORTS),
      log: (line) => h.lines.push(line),
    });

    expect(h.lines[0]).toBe("Found 3 Darshan files to process");
    expect(h.lines).toContain("Processing 2/3: b.darshan");
    expect(h.lines).toContain(
      "  Skipping due to parse error: totals report unavailable: exit 1",
    );
    expect(h.lines).toContain("  Missing 2 counters (set to 0):");
    expect(h.lines).toContain("    - tag (POSIX_PERF_MIBS)");
    expect(h.lines).toContain("Processed 2/3 files (1 skipped)");
    expect(h.lines.slice(-2)).toEqual([
      "    nprocs: missing in 1/3 files",
      "    tag (POSIX_PERF_MIBS): missing in 1/3 files",
    ]);
  });

  it("leaves out per-file missing lists when logMissing is off", async () => {
    const h = harness();

    await runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: h.openSink,
      discover: async () => Object.keys(REPORTS),
      log: (line) => h.lines.push(line),
      logMissing: false,
      topMissing: 1,
    });

    expect(h.lines).not.toContain("  Missing 2 counters (set to 0):");
    expect(h.lines.at(-1)).toBe("    nprocs: missing in 1/3 files");
  });

  it("lists no summary entries for a negative summary size", async () => {
    const h = harness();

    const result = await runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: h.openSink,
      discover: async () => Object.keys(REPORTS),
      log: (line) => h.lines.push(line),
      topMissing: -3,
    });

    expect(h.lines.slice(-2)).toEqual([
      "Global Missing Counter Summary:",
      "  (Number shows how many files were missing each counter)",
    ]);
    expect(result.missingCounters).toHaveLength(2);
  });

  it("does not open the output table when no traces are found", async () => {
    const h = harness();
    const openSink = vi.fn(h.openSink);

    const result = await runCorpus({
      inputDir: "/empty",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink,
      discover: async () => [],
      log: (line) => h.lines.push(line),
    });

    expect(openSink).not.toHaveBeenCalled();
    expect(h.lines).toEqual(["No .darshan files found in /empty"]);
    expect(result.output).toBeNull();
    expect(result.discoveredFileCount).toBe(0);
    expect(result.processedFileCount).toBe(0);
  });

  it("skips a trace whose report source throws", async () => {
    const h = harness();

    const result = await runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: h.openSink,
      discover: async () => ["/traces/a.darshan", "/traces/unknown.darshan"],
      log: () => undefined,
    });

    expect(result.processedFileCount).toBe(1);
    expect(result.skippedFiles).toEqual([
      {
        path: "/traces/unknown.darshan",
        message: "no reports for /traces/unknown.darshan",
      },
    ]);
  });

  it("closes the sink when a row cannot be written", async () => {
    const h = harness();
    let closed = false;

    const run = runCorpus({
      inputDir: "/traces",
      output: "/out/features.csv",
      schema: SCHEMA,
      reportSource: h.source,
      openSink: async () => ({
        async writeRow() {
          throw new Error("disk full");
        },
        async close() {
          closed = true;
        },
      }),
      discover: async () => ["/traces/a.darshan"],
      log: () => undefined,
    });

    await expect(run).rejects.toThrow("disk full");
    expect(closed).toBe(true);
  });
});
