import type { InputSize, Position } from "../types/brands";

/* ── input ───────────────────────────────────────────────── */
export type Sequence<T> = readonly T[];

export type Equality<T> = (a: T, b: T) => boolean;

export const strictEquals = <T>(a: T, b: T): boolean => a === b;

/* ── outcomes ────────────────────────────────────────────── */
export type Found<T> = { readonly kind: "found"; readonly element: T };
export type NotFound = { readonly kind: "not-found" };

export type MajorityOutcome<T> = Found<T> | NotFound;

export type MajorityResult<T> = Found<T> & {
  readonly count: number;
  readonly positions: readonly Position[];
};

export const found = <T>(element: T): Found<T> => ({ kind: "found", element });
export const notFound: NotFound = Object.freeze({ kind: "not-found" });

/* ── instrumentation ─────────────────────────────────────── */
export interface MetricsSink {
  comparison(n?: number): void;
  assignment(n?: number): void;
  access(n?: number): void;
}

/** Monotonic clock and heap reading used by the recorder. */
export interface Probe {
  now(): bigint;
  heapUsed(): number;
}

export type MetricsSnapshot = {
  readonly inputSize: InputSize;
  readonly comparisons: number;
  readonly assignments: number;
  readonly accesses: number;
  readonly elapsedNs: bigint;
  readonly elapsedMs: number;
  /** Heap delta in bytes; best-effort and may be negative. */
  readonly memoryDelta: number;
};

export type Measured<R> = {
  readonly result: R;
  readonly metrics: MetricsSnapshot;
};

export type VoteOptions<T> = {
  equals?: Equality<T>;
  probe?: Probe;
};
