export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, x) => sum + x, 0) / values.length;

/** Population standard deviation around `avg`. */
export const stdDev = (values: readonly number[], avg: number = mean(values)): number =>
  values.length === 0
    ? 0
    : Math.sqrt(values.reduce((sum, x) => sum + (x - avg) ** 2, 0) / values.length);

// integer division, rounding toward zero
export const truncatedAverage = (total: number, count: number): number =>
  count === 0 ? 0 : Math.trunc(total / count);
