import { describe, expect, it } from "vitest";
import {
  DEFAULT_RESOLUTION_STRATEGIES,
  type ResolutionStrategy,
  resolveCounter,
} from "../src/core/counterReconciler.js";

describe("resolveCounter", () => {
  it("prefers the exact key over the total_ variant", () => {
    const counters = new Map([
      ["STDIO_OPENS", "5"],
      ["total_STDIO_OPENS", "9"],
    ]);

    expect(resolveCounter("STDIO_OPENS", counters)).toEqual({
      key: "STDIO_OPENS",
      value: "5",
      strategy: "exact",
    });
  });

  it("falls back to the total_ prefixed key", () => {
    const counters = new Map([["total_STDIO_OPENS", "9"]]);

    expect(resolveCounter("STDIO_OPENS", counters)).toEqual({
      key: "total_STDIO_OPENS",
      value: "9",
      strategy: "total-prefix",
    });
  });

  it("returns null when no strategy matches", () => {
    const counters = new Map([["POSIX_OPENS", "1"]]);
    expect(resolveCounter("POSIX_SEEKS", counters)).toBeNull();
  });

  it("treats an empty value as resolved", () => {
    expect(resolveCounter("nprocs", new Map([["nprocs", ""]]))?.value).toBe("");
  });

  it("evaluates custom strategies in order", () => {
    const lowerCase: ResolutionStrategy = {
      name: "lower-case",
      candidateKey: (column) => column.toLowerCase(),
    };
    const counters = new Map([["nprocs", "16"]]);

    expect(resolveCounter("NPROCS", counters)).toBeNull();
    const strategies = [...DEFAULT_RESOLUTION_STRATEGIES, lowerCase];
    expect(resolveCounter("NPROCS", counters, strategies)?.strategy).toBe(
      "lower-case",
    );
  });
});
