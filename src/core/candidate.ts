import {
  found,
  notFound,
  strictEquals,
  type Equality,
  type Found,
  type MajorityOutcome,
  type MetricsSink,
  type Sequence,
} from "./types";

/**
 * Voting pass. Adopts a new candidate whenever the tally is zero, otherwise
 * moves the tally one step toward or away from the current candidate.
 * If a majority exists it is the candidate left standing.
 */
export const findCandidate = <T>(
  sequence: Sequence<T>,
  sink: MetricsSink,
  equals: Equality<T> = strictEquals,
): MajorityOutcome<T> => {
  let candidate: Found<T> | undefined;
  let count = 0;

  for (let i = 0; i < sequence.length; i++) {
    sink.access();
    const current = sequence[i];

    if (candidate === undefined || count === 0) {
      candidate = found(current);
      sink.assignment();
      count = 1;
      continue;
    }

    sink.comparison();
    if (equals(current, candidate.element)) count++;
    else count--;
  }

  return candidate ?? notFound;
};
