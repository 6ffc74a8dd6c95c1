import { asInputSize } from "../types/brands";
import type { MetricsSink, MetricsSnapshot, Probe } from "./types";

export const systemProbe: Probe = {
  now: () => process.hrtime.bigint(),
  heapUsed: () => process.memoryUsage().heapUsed,
};

const NS_PER_MS = 1_000_000;

/**
 * Counters and timer for a single invocation. Create one per call; a recorder
 * is never reset or shared.
 */
export class MetricsRecorder implements MetricsSink {
  private comparisons = 0;
  private assignments = 0;
  private accesses = 0;
  private inputSize = 0;
  private startNs = 0n;
  private endNs = 0n;
  private heapBefore = 0;
  private heapAfter = 0;

  constructor(private readonly probe: Probe = systemProbe) {}

  comparison(n = 1): void {
    this.comparisons += n;
  }

  assignment(n = 1): void {
    this.assignments += n;
  }

  access(n = 1): void {
    this.accesses += n;
  }

  start(inputSize: number): void {
    this.inputSize = inputSize;
    this.heapBefore = this.probe.heapUsed();
    this.startNs = this.probe.now();
  }

  stop(): void {
    this.endNs = this.probe.now();
    this.heapAfter = this.probe.heapUsed();
  }

  snapshot(): MetricsSnapshot {
    const elapsedNs = this.endNs - this.startNs;
    return Object.freeze({
      inputSize: asInputSize(this.inputSize),
      comparisons: this.comparisons,
      assignments: this.assignments,
      accesses: this.accesses,
      elapsedNs,
      elapsedMs: Number(elapsedNs) / NS_PER_MS,
      memoryDelta: this.heapAfter - this.heapBefore,
    });
  }
}

export const formatMetrics = (m: MetricsSnapshot): string =>
  `n=${m.inputSize}, time=${m.elapsedMs.toFixed(3)}ms, cmp=${m.comparisons}, ` +
  `assign=${m.assignments}, access=${m.accesses}, mem=${m.memoryDelta}B`;
