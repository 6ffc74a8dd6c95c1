import type { InputSize, Seed } from "../types/brands";
import { mulberry32, randomInt, shuffleInPlace } from "./random";

export const INPUT_TYPES = [
  "clear-majority",
  "slim-majority",
  "no-majority",
  "unanimous",
  "custom",
] as const;

export type InputType = (typeof INPUT_TYPES)[number];

export const INPUT_TYPE_LABELS: Record<InputType, string> = {
  "clear-majority": "ClearMajority60%",
  "slim-majority": "SlimMajority51%",
  "no-majority": "NoMajority",
  unanimous: "Unanimous100%",
  custom: "Custom",
};

export const MAJORITY_VALUE = 1;
export const UNANIMOUS_VALUE = 42;

/**
 * Synthetic benchmark input. Same size, type and seed always give the same
 * array. Majority-bearing types place the majority value first, fill the rest
 * with values in [2, 101], then shuffle.
 */
export const generateInput = (
  size: InputSize,
  type: InputType,
  seed: Seed,
): number[] => {
  const rng = mulberry32(seed);
  const filler = () => randomInt(rng, 100) + 2;
  let arr: number[];

  switch (type) {
    case "clear-majority":
      arr = withMajority(size, Math.floor(size * 0.6), filler);
      break;
    case "slim-majority":
      arr = withMajority(size, Math.floor(size / 2) + 1, filler);
      break;
    case "no-majority": {
      const period = Math.floor(size / 3) + 1;
      arr = Array.from({ length: size }, (_, i) => i % period);
      break;
    }
    case "unanimous":
      arr = new Array<number>(size).fill(UNANIMOUS_VALUE);
      break;
    case "custom":
      arr = Array.from({ length: size }, () => randomInt(rng, 10));
      break;
  }

  return shuffleInPlace(arr, rng);
};

const withMajority = (
  size: number,
  majorityCount: number,
  filler: () => number,
): number[] =>
  Array.from({ length: size }, (_, i) => (i < majorityCount ? MAJORITY_VALUE : filler()));
