import * as v from "valibot";
import { INPUT_TYPES } from "./bench/inputs";
import { VARIANTS } from "./bench/runner";
import { ConfigError } from "./core/errors";
import { asInputSize, asSeed, type InputSize, type Seed } from "./types/brands";

export const DEFAULTS = {
  type: "clear-majority",
  sizes: "100,1000,10000,100000",
  warmup: "5",
  iterations: "10",
  seed: "42",
  variant: "standard",
  out: "boyer_moore_results.csv",
} as const;

// decimal digits only: Number() would also take "", "0x10" and "1e3"
const intSchema = (
  min: number,
  messages: { integer: string; min: string } = {
    integer: "must be an integer",
    min: `must be at least ${min}`,
  },
) =>
  v.pipe(
    v.string(),
    v.trim(),
    v.regex(/^-?\d+$/, messages.integer),
    v.transform(Number),
    v.number(),
    v.safeInteger("must be a safe integer"),
    v.minValue(min, messages.min),
  );

const sizesSchema = v.pipe(
  v.string(),
  v.transform((s) => s.split(",")),
  v.array(intSchema(1, { integer: "sizes must be integers", min: "sizes must be positive" })),
  v.nonEmpty("at least one size is required"),
);

export const benchConfigSchema = v.object({
  type: v.picklist(INPUT_TYPES, `type must be one of ${INPUT_TYPES.join(", ")}`),
  sizes: sizesSchema,
  warmup: intSchema(0),
  iterations: intSchema(1),
  seed: intSchema(0),
  variant: v.picklist(VARIANTS, `variant must be one of ${VARIANTS.join(", ")}`),
  out: v.pipe(v.string(), v.nonEmpty("output path is required")),
});

export type RawBenchConfig = Partial<Record<keyof typeof DEFAULTS, string>>;

export type BenchConfig = Omit<v.InferOutput<typeof benchConfigSchema>, "sizes" | "seed"> & {
  readonly sizes: readonly InputSize[];
  readonly seed: Seed;
};

/** Environment variables consulted when an option is not given explicitly. */
export const ENV_KEYS: Partial<Record<keyof typeof DEFAULTS, string>> = {
  sizes: "MAJORITY_SIZES",
  warmup: "MAJORITY_WARMUP",
  iterations: "MAJORITY_ITERATIONS",
  seed: "MAJORITY_SEED",
};

const valuesSchema = v.array(intSchema(Number.MIN_SAFE_INTEGER));

/** Parses command-line element values; an empty list is left for the core to reject. */
export const parseValues = (raw: readonly string[]): number[] => {
  const parsed = v.safeParse(valuesSchema, raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.issues.map((issue) => `values.${v.getDotPath(issue) ?? "?"}: ${issue.message}`),
    );
  }
  return parsed.output;
};

/**
 * Explicit options win over the environment, which wins over defaults.
 */
export const parseBenchConfig = (
  raw: RawBenchConfig,
  env: NodeJS.ProcessEnv = process.env,
): BenchConfig => {
  const pick = (key: keyof typeof DEFAULTS): string => {
    const envKey = ENV_KEYS[key];
    return raw[key] ?? (envKey ? env[envKey] : undefined) ?? DEFAULTS[key];
  };

  const parsed = v.safeParse(benchConfigSchema, {
    type: pick("type"),
    sizes: pick("sizes"),
    warmup: pick("warmup"),
    iterations: pick("iterations"),
    seed: pick("seed"),
    variant: pick("variant"),
    out: pick("out"),
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.issues.map((issue) => `${v.getDotPath(issue) ?? "config"}: ${issue.message}`),
    );
  }

  const { sizes, seed, ...rest } = parsed.output;
  return { ...rest, sizes: sizes.map(asInputSize), seed: asSeed(seed) };
};
