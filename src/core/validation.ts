import * as v from "valibot";
import { InvalidInputError } from "./errors";
import type { Sequence } from "./types";

// checks shape and length only; elements are never read
export const sequenceSchema = v.pipe(
  v.custom<readonly unknown[]>(Array.isArray, "sequence cannot be null"),
  v.check((s) => s.length > 0, "sequence cannot be empty"),
);

/** Rejects a missing or empty sequence before any scanning or measurement. */
export function validateSequence<T>(
  sequence: Sequence<T> | null | undefined,
): asserts sequence is Sequence<T> {
  const parsed = v.safeParse(sequenceSchema, sequence);
  if (parsed.success) return;

  const [issue] = parsed.issues;
  throw new InvalidInputError(
    issue.type === "check" ? "empty" : "missing",
    issue.message,
  );
}
