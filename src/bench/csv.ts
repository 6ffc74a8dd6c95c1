import { writeFile } from "node:fs/promises";
import type { BenchmarkRow } from "./runner";

export const CSV_HEADER = [
  "InputSize",
  "InputType",
  "AvgTimeMs",
  "StdDevMs",
  "Comparisons",
  "Assignments",
  "ArrayAccesses",
  "MemoryBytes",
  "Result",
] as const;

export const toCsvLine = (row: BenchmarkRow): string =>
  [
    row.inputSize,
    row.inputType,
    row.avgTimeMs.toFixed(4),
    row.stdDevMs.toFixed(4),
    row.comparisons,
    row.assignments,
    row.accesses,
    row.memoryBytes,
    row.result,
  ].join(",");

export const toCsv = (rows: readonly BenchmarkRow[]): string =>
  [CSV_HEADER.join(","), ...rows.map(toCsvLine)].join("\n") + "\n";

export const writeCsv = (path: string, rows: readonly BenchmarkRow[]): Promise<void> =>
  writeFile(path, toCsv(rows), "utf8");
