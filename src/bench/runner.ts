import { findMajority, findMajorityOptimized } from "../core/majority";
import type { MajorityOutcome, Measured, Probe, Sequence } from "../core/types";
import type { ILogger } from "../logging";
import type { BenchConfig } from "../schema";
import type { InputSize } from "../types/brands";
import { generateInput, INPUT_TYPE_LABELS } from "./inputs";
import { mean, stdDev, truncatedAverage } from "./stats";

export const VARIANTS = ["standard", "optimized"] as const;
export type Variant = (typeof VARIANTS)[number];

type Finder = (
  sequence: Sequence<number>,
  options: { probe?: Probe },
) => Measured<MajorityOutcome<number>>;

const FINDERS: Record<Variant, Finder> = {
  standard: findMajority,
  optimized: findMajorityOptimized,
};

export type Measurement = {
  readonly avgTimeMs: number;
  readonly stdDevMs: number;
  readonly comparisons: number;
  readonly assignments: number;
  readonly accesses: number;
  readonly memoryBytes: number;
  readonly result: string;
};

export type BenchmarkRow = Measurement & {
  readonly inputSize: InputSize;
  readonly inputType: string;
};

export type RunOptions = {
  readonly warmup: number;
  readonly iterations: number;
  readonly variant: Variant;
  readonly probe?: Probe;
};

const render = (outcome: MajorityOutcome<number>): string =>
  outcome.kind === "found" ? String(outcome.element) : "null";

/**
 * Warm-up calls are discarded. Every call, warm or measured, gets its own copy
 * of `input`.
 */
export const runBenchmark = (
  input: readonly number[],
  { warmup, iterations, variant, probe }: RunOptions,
): Measurement => {
  const find = FINDERS[variant];

  for (let i = 0; i < warmup; i++) find([...input], { probe });

  const times: number[] = [];
  let comparisons = 0;
  let assignments = 0;
  let accesses = 0;
  let memory = 0;
  let outcome: MajorityOutcome<number> | undefined;

  for (let i = 0; i < iterations; i++) {
    const { result, metrics } = find([...input], { probe });
    times.push(metrics.elapsedMs);
    comparisons += metrics.comparisons;
    assignments += metrics.assignments;
    accesses += metrics.accesses;
    memory += metrics.memoryDelta;
    outcome = result;
  }

  const avgTimeMs = mean(times);
  return {
    avgTimeMs,
    stdDevMs: stdDev(times, avgTimeMs),
    comparisons: truncatedAverage(comparisons, iterations),
    assignments: truncatedAverage(assignments, iterations),
    accesses: truncatedAverage(accesses, iterations),
    memoryBytes: truncatedAverage(memory, iterations),
    result: outcome ? render(outcome) : "null",
  };
};

export const runSuite = (
  config: BenchConfig,
  log: ILogger,
  probe?: Probe,
): BenchmarkRow[] => {
  log.info(
    {
      type: config.type,
      variant: config.variant,
      sizes: config.sizes,
      warmup: config.warmup,
      iterations: config.iterations,
    },
    "benchmark start",
  );

  return config.sizes.map((size) => {
    const input = generateInput(size, config.type, config.seed);
    const measurement = runBenchmark(input, { ...config, probe });
    log.debug({ size, ...measurement }, "size done");
    return { inputSize: size, inputType: INPUT_TYPE_LABELS[config.type], ...measurement };
  });
};
