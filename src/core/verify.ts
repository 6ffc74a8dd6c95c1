import {
  strictEquals,
  type Equality,
  type MajorityOutcome,
  type MetricsSink,
  type Sequence,
} from "./types";

export type Verdict = {
  readonly isMajority: boolean;
  readonly occurrences: number;
};

const NO_CANDIDATE: Verdict = Object.freeze({ isMajority: false, occurrences: 0 });

export const majorityThreshold = (length: number): number =>
  Math.floor(length / 2);

/**
 * Counting pass over the whole sequence. Majority means strictly more than
 * floor(n/2) occurrences, so a value filling exactly half is rejected.
 */
export const verifyCandidate = <T>(
  sequence: Sequence<T>,
  candidate: MajorityOutcome<T>,
  sink: MetricsSink,
  equals: Equality<T> = strictEquals,
): Verdict => {
  if (candidate.kind === "not-found") return NO_CANDIDATE;

  let occurrences = 0;
  for (let i = 0; i < sequence.length; i++) {
    sink.access();
    sink.comparison();
    if (equals(sequence[i], candidate.element)) occurrences++;
  }

  sink.comparison();
  return { isMajority: occurrences > majorityThreshold(sequence.length), occurrences };
};
