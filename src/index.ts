export * from "./core/types";
export * from "./core/errors";
export { findCandidate } from "./core/candidate";
export { verifyCandidate, majorityThreshold, type Verdict } from "./core/verify";
export { collectPositions } from "./core/positions";
export { validateSequence } from "./core/validation";
export { MetricsRecorder, formatMetrics, systemProbe } from "./core/metrics";
export {
  findMajority,
  findMajorityOptimized,
  findMajorityWithPositions,
  MajorityVoter,
} from "./core/majority";
export { generateInput, INPUT_TYPES, INPUT_TYPE_LABELS, type InputType } from "./bench/inputs";
export { runBenchmark, runSuite, type BenchmarkRow, type Variant } from "./bench/runner";
export { toCsv, writeCsv, CSV_HEADER } from "./bench/csv";
export { parseBenchConfig, type BenchConfig } from "./schema";
export * from "./types/brands";
