import { describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CSV_HEADER, toCsv, toCsvLine, writeCsv } from "../src/bench/csv";
import { runBenchmark, runSuite, type BenchmarkRow } from "../src/bench/runner";
import { mean, stdDev, truncatedAverage } from "../src/bench/stats";
import type { Probe } from "../src/core/types";
import { silentLogger, type ILogger } from "../src/logging";
import { parseBenchConfig } from "../src/schema";
import { asInputSize } from "../src/types/brands";
import { steppingProbe } from "./helpers/probe";

describe("stats", () => {
  it("computes the mean", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBe(0);
  });

  it("computes the population standard deviation", () => {
    expect(stdDev([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(1.25), 12);
    expect(stdDev([5, 5, 5])).toBe(0);
    expect(stdDev([])).toBe(0);
  });

  it("averages counters by integer division", () => {
    expect(truncatedAverage(25, 10)).toBe(2);
    expect(truncatedAverage(-25, 10)).toBe(-2);
    expect(truncatedAverage(7, 0)).toBe(0);
  });
});

describe("runBenchmark", () => {
  it("averages counters over measured iterations only", () => {
    const m = runBenchmark([1, 1, 1, 2, 2], {
      warmup: 2,
      iterations: 3,
      variant: "standard",
      probe: steppingProbe(2_000_000n, 512),
    });
    expect(m).toEqual({
      avgTimeMs: 2,
      stdDevMs: 0,
      comparisons: 10,
      assignments: 1,
      accesses: 10,
      memoryBytes: 512,
      result: "1",
    });
  });

  it("derives spread from uneven timings", () => {
    // start/stop reads per call: 0→1ms, 1→4ms, 4→9ms
    const ticks = [0n, 1_000_000n, 1_000_000n, 4_000_000n, 4_000_000n, 9_000_000n];
    let i = 0;
    const probe: Probe = { now: () => ticks[i++], heapUsed: () => 0 };

    const m = runBenchmark([3, 3], { warmup: 0, iterations: 3, variant: "standard", probe });
    expect(m.avgTimeMs).toBe(3);
    expect(m.stdDevMs).toBeCloseTo(Math.sqrt(8 / 3), 12);
  });

  it("runs the early-terminating variant when asked", () => {
    const m = runBenchmark([4, 4, 4, 4], {
      warmup: 0,
      iterations: 1,
      variant: "optimized",
      probe: steppingProbe(),
    });
    expect(m.comparisons).toBe(2);
    expect(m.result).toBe("4");
  });

  it("renders a missing majority as null", () => {
    const m = runBenchmark([1, 2], { warmup: 0, iterations: 1, variant: "standard", probe: steppingProbe() });
    expect(m.result).toBe("null");
  });
});

describe("runSuite", () => {
  it("produces one labelled row per size and logs progress", () => {
    const log: ILogger = { ...silentLogger, info: vi.fn(), debug: vi.fn() };
    const config = parseBenchConfig(
      { type: "unanimous", sizes: "4,8", warmup: "0", iterations: "2" },
      {},
    );

    const rows = runSuite(config, log, steppingProbe());

    expect(rows.map((r) => [r.inputSize, r.inputType, r.comparisons, r.accesses, r.result])).toEqual([
      [4, "Unanimous100%", 8, 8, "42"],
      [8, "Unanimous100%", 16, 16, "42"],
    ]);
    expect(log.info).toHaveBeenCalledTimes(1);
    expect(log.debug).toHaveBeenCalledTimes(2);
  });
});

describe("csv", () => {
  const row: BenchmarkRow = {
    inputSize: asInputSize(100),
    inputType: "ClearMajority60%",
    avgTimeMs: 0.5,
    stdDevMs: 1.25,
    comparisons: 201,
    assignments: 3,
    accesses: 200,
    memoryBytes: -64,
    result: "1",
  };

  it("formats a row with four-decimal timings", () => {
    expect(toCsvLine(row)).toBe("100,ClearMajority60%,0.5000,1.2500,201,3,200,-64,1");
  });

  it("prefixes the header and ends with a newline", () => {
    expect(toCsv([row])).toBe(
      "InputSize,InputType,AvgTimeMs,StdDevMs,Comparisons,Assignments,ArrayAccesses,MemoryBytes,Result\n" +
        "100,ClearMajority60%,0.5000,1.2500,201,3,200,-64,1\n",
    );
    expect(CSV_HEADER).toHaveLength(9);
  });

  it("writes the file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "majority-"));
    try {
      const path = join(dir, "out.csv");
      await writeCsv(path, [row]);
      expect(await readFile(path, "utf8")).toBe(toCsv([row]));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
