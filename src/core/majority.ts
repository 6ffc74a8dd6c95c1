import { findCandidate } from "./candidate";
import { MetricsRecorder } from "./metrics";
import { collectPositions } from "./positions";
import {
  found,
  notFound,
  strictEquals,
  type Found,
  type MajorityOutcome,
  type MajorityResult,
  type Measured,
  type MetricsSnapshot,
  type NotFound,
  type Sequence,
  type VoteOptions,
} from "./types";
import { validateSequence } from "./validation";
import { majorityThreshold, verifyCandidate } from "./verify";

const measure = <T, R>(
  sequence: Sequence<T> | null | undefined,
  options: VoteOptions<T>,
  body: (input: Sequence<T>, recorder: MetricsRecorder) => R,
): Measured<R> => {
  validateSequence(sequence);

  const recorder = new MetricsRecorder(options.probe);
  recorder.start(sequence.length);
  const result = body(sequence, recorder);
  recorder.stop();

  return { result, metrics: recorder.snapshot() };
};

/* ──────────── two-phase vote ──────────── */
export const findMajority = <T>(
  sequence: Sequence<T> | null | undefined,
  options: VoteOptions<T> = {},
): Measured<MajorityOutcome<T>> =>
  measure(sequence, options, (input, recorder) => {
    const equals = options.equals ?? strictEquals;
    const candidate = findCandidate(input, recorder, equals);
    const verdict = verifyCandidate(input, candidate, recorder, equals);
    return verdict.isMajority ? candidate : notFound;
  });

/* ──────────── two-phase vote + position pass ──────────── */
export const findMajorityWithPositions = <T>(
  sequence: Sequence<T> | null | undefined,
  options: VoteOptions<T> = {},
): Measured<MajorityResult<T> | NotFound> =>
  measure(sequence, options, (input, recorder): MajorityResult<T> | NotFound => {
    const equals = options.equals ?? strictEquals;
    const candidate = findCandidate(input, recorder, equals);
    const verdict = verifyCandidate(input, candidate, recorder, equals);
    if (candidate.kind === "not-found" || !verdict.isMajority) return notFound;

    const positions = collectPositions(input, candidate.element, recorder, equals);
    return {
      kind: "found",
      element: candidate.element,
      count: verdict.occurrences,
      positions: Object.freeze(positions),
    };
  });

/* ──────────── vote with early termination ──────────── */
export const findMajorityOptimized = <T>(
  sequence: Sequence<T> | null | undefined,
  options: VoteOptions<T> = {},
): Measured<MajorityOutcome<T>> =>
  measure(sequence, options, (input, recorder) => {
    const equals = options.equals ?? strictEquals;
    const threshold = majorityThreshold(input.length);
    let candidate: Found<T> | undefined;
    let count = 0;

    for (let i = 0; i < input.length; i++) {
      recorder.access();
      const current = input[i];

      if (candidate === undefined || count === 0) {
        candidate = found(current);
        recorder.assignment();
        count = 1;
        continue;
      }

      recorder.comparison();
      if (equals(current, candidate.element)) {
        count++;
        // tally alone already exceeds half of all n elements
        if (count > threshold) return candidate;
      } else {
        count--;
      }
    }

    const standing = candidate ?? notFound;
    return verifyCandidate(input, standing, recorder, equals).isMajority
      ? standing
      : notFound;
  });

/* ──────────── stateful facade ──────────── */

/**
 * Keeps the metrics of its most recent successful call. Use one voter per
 * concurrent caller; the free functions above carry no state at all.
 */
export class MajorityVoter<T> {
  private last: MetricsSnapshot | undefined;

  constructor(private readonly options: VoteOptions<T> = {}) {}

  findMajority(sequence: Sequence<T> | null | undefined): MajorityOutcome<T> {
    return this.record(findMajority(sequence, this.options));
  }

  findMajorityWithPositions(
    sequence: Sequence<T> | null | undefined,
  ): MajorityResult<T> | NotFound {
    return this.record(findMajorityWithPositions(sequence, this.options));
  }

  findMajorityOptimized(sequence: Sequence<T> | null | undefined): MajorityOutcome<T> {
    return this.record(findMajorityOptimized(sequence, this.options));
  }

  getMetrics(): MetricsSnapshot | undefined {
    return this.last;
  }

  private record<R>({ result, metrics }: Measured<R>): R {
    this.last = metrics;
    return result;
  }
}
