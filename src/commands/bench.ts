import { Command } from "commander";
import { writeCsv } from "../bench/csv";
import { INPUT_TYPES } from "../bench/inputs";
import { runSuite, VARIANTS, type BenchmarkRow } from "../bench/runner";
import type { Probe } from "../core/types";
import type { ILogger } from "../logging";
import { parseBenchConfig, type RawBenchConfig } from "../schema";
import { writeStdout } from "../utils/terminal";

export function benchCommand(log: ILogger): Command {
  return new Command("bench")
    .description("Benchmark the majority vote on synthetic inputs and write CSV results")
    .option("--type <type>", `input type (${INPUT_TYPES.join("|")})`)
    .option("--sizes <sizes>", "comma-separated input sizes")
    .option("--warmup <n>", "unmeasured warm-up calls per size")
    .option("--iterations <n>", "measured calls per size")
    .option("--seed <n>", "generator seed")
    .option("--variant <variant>", `algorithm variant (${VARIANTS.join("|")})`)
    .option("--out <file>", "CSV output path")
    .action(async (opts: RawBenchConfig) => {
      const { out, rows } = runBench(opts, log);
      for (const row of rows) writeStdout(formatRow(row));
      await writeCsv(out, rows);
      log.info({ out, rows: rows.length }, "results saved");
      writeStdout(`Results saved to ${out}`);
    });
}

export function runBench(
  opts: RawBenchConfig,
  log: ILogger,
  probe?: Probe,
  env?: NodeJS.ProcessEnv,
): { out: string; rows: BenchmarkRow[] } {
  const config = parseBenchConfig(opts, env);
  const rows = runSuite(config, log, probe);
  return { out: config.out, rows };
}

export const formatRow = (row: BenchmarkRow): string =>
  `Size: ${String(row.inputSize).padStart(6)} | ` +
  `Time: ${row.avgTimeMs.toFixed(4).padStart(8)} ms | ` +
  `Comparisons: ${String(row.comparisons).padStart(10)} | ` +
  `Result: ${row.result}`;
