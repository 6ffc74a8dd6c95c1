import { asPosition, type Position } from "../types/brands";
import {
  strictEquals,
  type Equality,
  type MetricsSink,
  type Sequence,
} from "./types";

/** Ascending indices at which `element` occurs. */
export const collectPositions = <T>(
  sequence: Sequence<T>,
  element: T,
  sink: MetricsSink,
  equals: Equality<T> = strictEquals,
): Position[] => {
  const positions: Position[] = [];
  for (let i = 0; i < sequence.length; i++) {
    sink.access();
    sink.comparison();
    if (equals(sequence[i], element)) positions.push(asPosition(i));
  }
  return positions;
};
