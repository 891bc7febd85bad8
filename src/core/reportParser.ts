import type {
  CounterSet,
  ReportKind,
  ReportModule,
  TraceParseOutcome,
  TraceReports,
} from "./types.js";

export const PERF_COUNTER_KEY = "POSIX_PERF_MIBS";
export const NPROCS_COUNTER_KEY = "nprocs";
export const LUSTRE_LAYOUT_FIELDS = [
  "LUSTRE_STRIPE_WIDTH",
  "LUSTRE_STRIPE_SIZE",
] as const;

export type LustreLayoutField = (typeof LUSTRE_LAYOUT_FIELDS)[number];

const TOTAL_PREFIX = "total";
const TOTAL_POSIX_PREFIX = "total_POSIX_";
const NPROCS_PREFIX = "# nprocs:";
const AGG_PERF_MARKER = "agg_perf_by_slowest:";

const MODULE_HEADERS: ReadonlyArray<{ marker: string; module: ReportModule }> = [
  { marker: "# POSIX module data", module: "POSIX" },
  { marker: "# MPI-IO module data", module: "MPI-IO" },
  { marker: "# STDIO module data", module: "STDIO" },
];

const INTEGER_PATTERN = /^[+-]?\d+$/;

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function splitOnFirstColon(line: string): [string, string] | null {
  const index = line.indexOf(":");
  if (index < 0) {
    return null;
  }
  return [line.slice(0, index), line.slice(index + 1)];
}

function isLustreLayoutField(value: string): value is LustreLayoutField {
  return LUSTRE_LAYOUT_FIELDS.some((field) => field === value);
}

/**
 * Reads `total_*` counters and the `# nprocs:` header from a totals report.
 * POSIX totals are stored under their bare name (`POSIX_BYTES_READ`); every
 * other total keeps its prefix.
 */
export function parseTotalsReport(
  text: string,
  counters: CounterSet = new Map(),
): CounterSet {
  let nprocsSeen = false;

  for (const line of splitLines(text)) {
    if (line.startsWith(TOTAL_PREFIX)) {
      const parts = splitOnFirstColon(line.trim());
      if (!parts) {
        continue;
      }

      const key = parts[0].trim();
      const value = parts[1].trim();
      counters.set(
        key.startsWith(TOTAL_POSIX_PREFIX) ? key.slice("total_".length) : key,
        value,
      );
      continue;
    }

    if (!nprocsSeen && line.startsWith(NPROCS_PREFIX)) {
      counters.set(NPROCS_COUNTER_KEY, line.slice(NPROCS_PREFIX.length).trim());
      nprocsSeen = true;
    }
  }

  return counters;
}

function moduleHeaderOf(line: string): ReportModule | null {
  const header = MODULE_HEADERS.find((candidate) =>
    line.includes(candidate.marker),
  );
  return header?.module ?? null;
}

/**
 * Returns the POSIX `agg_perf_by_slowest` value (MiB/s) of a performance
 * report, or `undefined` when the report carries none. Only the POSIX module's
 * section counts; the module state starts unset.
 */
export function parsePerformanceReport(text: string): string | undefined {
  let currentModule: ReportModule | null = null;
  let perf: string | undefined;

  for (const line of splitLines(text)) {
    const header = moduleHeaderOf(line);
    if (header) {
      currentModule = header;
      continue;
    }

    if (currentModule !== "POSIX" || !line.includes(AGG_PERF_MARKER)) {
      continue;
    }

    const parts = splitOnFirstColon(line);
    if (!parts) {
      continue;
    }
    perf = (parts[1].split("#")[0] ?? "").trim();
  }

  return perf;
}

/**
 * Averages the Lustre stripe records of a layout extract. Each field present
 * at least once yields `trunc(mean)` as a decimal string.
 */
export function parseLayoutReport(
  text: string,
): Partial<Record<LustreLayoutField, string>> {
  const samples: Record<LustreLayoutField, number[]> = {
    LUSTRE_STRIPE_WIDTH: [],
    LUSTRE_STRIPE_SIZE: [],
  };

  for (const line of splitLines(text)) {
    const fields = line.trim().split("\t");
    if (fields.length < 2) {
      continue;
    }

    const [name, rawValue] = fields;
    if (
      name === undefined ||
      rawValue === undefined ||
      !isLustreLayoutField(name)
    ) {
      continue;
    }

    const value = rawValue.trim();
    if (!INTEGER_PATTERN.test(value)) {
      continue;
    }
    samples[name].push(Number.parseInt(value, 10));
  }

  const reduced: Partial<Record<LustreLayoutField, string>> = {};
  for (const field of LUSTRE_LAYOUT_FIELDS) {
    const values = samples[field];
    if (values.length === 0) {
      continue;
    }
    const sum = values.reduce((acc, value) => acc + value, 0);
    reduced[field] = String(Math.trunc(sum / values.length));
  }

  return reduced;
}

export function parseTraceReports(reports: TraceReports): TraceParseOutcome {
  if (!reports.totals.ok) {
    return {
      ok: false,
      reason: `totals report unavailable: ${reports.totals.error}`,
    };
  }

  const counters = parseTotalsReport(reports.totals.text);
  const unavailableSections: ReportKind[] = [];

  if (reports.perf.ok) {
    const perf = parsePerformanceReport(reports.perf.text);
    if (perf !== undefined) {
      counters.set(PERF_COUNTER_KEY, perf);
    }
  } else {
    unavailableSections.push("perf");
  }

  if (reports.layout.ok) {
    const layout = parseLayoutReport(reports.layout.text);
    for (const field of LUSTRE_LAYOUT_FIELDS) {
      const value = layout[field];
      if (value !== undefined) {
        counters.set(field, value);
      }
    }
  } else {
    unavailableSections.push("layout");
  }

  return {
    ok: true,
    counters,
    unavailableSections,
  };
}
