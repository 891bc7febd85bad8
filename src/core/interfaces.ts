import type { TraceReports } from "./types.js";

export interface TraceReportSource {
  readReports(tracePath: string): Promise<TraceReports>;
}

export interface FeatureTableSink {
  writeRow(row: readonly number[]): Promise<void>;
  close(): Promise<void>;
}

export type FeatureTableSinkFactory = (
  destination: string,
  header: readonly string[],
) => Promise<FeatureTableSink>;

export type TraceDiscovery = (inputDir: string) => Promise<string[]>;

export type RunLog = (line: string) => void;
