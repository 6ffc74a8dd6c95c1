import { Command } from "commander";
import {
  findMajority,
  findMajorityOptimized,
  findMajorityWithPositions,
} from "../core/majority";
import { formatMetrics } from "../core/metrics";
import type { Probe } from "../core/types";
import { parseValues } from "../schema";
import { writeStdout } from "../utils/terminal";

export type FindOptions = {
  optimized?: boolean;
  positions?: boolean;
};

const NO_MAJORITY = "No majority element";

export function findCommand(): Command {
  return new Command("find")
    .description("Find the majority element of a list of integers")
    .argument("[values...]", "sequence elements")
    .option("--optimized", "use the early-terminating vote")
    .option("--positions", "also list every index of the majority element")
    .action((values: string[], opts: FindOptions) => {
      for (const line of runFind(values, opts)) writeStdout(line);
    });
}

/** Output lines for one `find` invocation. */
export function runFind(values: readonly string[], opts: FindOptions, probe?: Probe): string[] {
  const sequence = parseValues(values);

  if (opts.positions) {
    const { result, metrics } = findMajorityWithPositions(sequence, { probe });
    if (result.kind === "not-found") return [NO_MAJORITY, formatMetrics(metrics)];
    return [
      `Majority Element: ${result.element} (appears ${result.count} times)`,
      `Positions: ${result.positions.join(", ")}`,
      formatMetrics(metrics),
    ];
  }

  const find: typeof findMajority = opts.optimized ? findMajorityOptimized : findMajority;
  const { result, metrics } = find(sequence, { probe });
  return [
    result.kind === "found" ? `Majority Element: ${result.element}` : NO_MAJORITY,
    formatMetrics(metrics),
  ];
}
