import { quantile } from "./outliers";

export type DescriptiveStatistics = {
  count: number;
  minimum: number;
  maximum: number;
  median: number;
  mean: number;
  /** Sample standard deviation (n - 1); NaN below two values. */
  standardDeviation: number;
  /** standardDeviation / mean; NaN when the mean is zero. */
  variationCoefficient: number;
};

export type VariationCoefficientForm = "ratio" | "percent";

export type StatisticsOptions = {
  /** null keeps full precision. */
  decimals: number | null;
  variationCoefficient: VariationCoefficientForm;
};

const ZERO_TOLERANCE = 1e-8;

export const sampleStandardDeviation = (values: number[]): number => {
  if (values.length < 2) {
    return Number.NaN;
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance =
    values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
};

export const variationCoefficient = (standardDeviation: number, mean: number): number => {
  if (Number.isNaN(standardDeviation) || Math.abs(mean) < ZERO_TOLERANCE) {
    return Number.NaN;
  }
  return standardDeviation / mean;
};

export const describeValues = (values: (number | null)[]): DescriptiveStatistics | null => {
  const present = values.filter((value): value is number => value !== null && !Number.isNaN(value));
  if (present.length === 0) {
    return null;
  }
  const sorted = [...present].sort((a, b) => a - b);
  const mean = present.reduce((sum, value) => sum + value, 0) / present.length;
  const standardDeviation = sampleStandardDeviation(present);

  return {
    count: present.length,
    minimum: sorted[0],
    maximum: sorted[sorted.length - 1],
    median: quantile(sorted, 0.5),
    mean,
    standardDeviation,
    variationCoefficient: variationCoefficient(standardDeviation, mean)
  };
};

export const roundTo = (value: number, decimals: number): number => {
  if (!Number.isFinite(value)) {
    return value;
  }
  const factor = 10 ** decimals;
  const scaled = Math.abs(value) * factor;
  // toPrecision trims binary noise like 2.675 * 100 = 267.49999999999997
  const rounded = Math.round(Number(scaled.toPrecision(15))) / factor;
  return value < 0 ? -rounded : rounded;
};

/** Applies the report's precision and variation-coefficient form. */
export const presentStatistics = (
  stats: DescriptiveStatistics,
  options: StatisticsOptions
): DescriptiveStatistics => {
  const cv =
    options.variationCoefficient === "percent"
      ? stats.variationCoefficient * 100
      : stats.variationCoefficient;
  const round = (value: number): number =>
    options.decimals === null ? value : roundTo(value, options.decimals);

  return {
    count: stats.count,
    minimum: round(stats.minimum),
    maximum: round(stats.maximum),
    median: round(stats.median),
    mean: round(stats.mean),
    standardDeviation: round(stats.standardDeviation),
    variationCoefficient: round(cv)
  };
};
