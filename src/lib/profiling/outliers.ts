export type OutlierFormat = "list" | "summary";

export type OutlierOptions = {
  /** k in Q1 - k*IQR / Q3 + k*IQR. */
  fenceMultiplier: number;
  minSamples: number;
};

export type IqrFence = {
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
};

export const NO_OUTLIERS = "No Outliers";

export const DEFAULT_OUTLIER_OPTIONS: OutlierOptions = {
  fenceMultiplier: 1.5,
  minSamples: 4
};

/** Linear-interpolation percentile over values sorted ascending; p in 0..1. */
export const quantile = (sorted: number[], p: number): number => {
  if (sorted.length === 0) {
    return Number.NaN;
  }
  const position = (sorted.length - 1) * p;
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const fraction = position - lowerIndex;
  return sorted[lowerIndex] + (sorted[upperIndex] - sorted[lowerIndex]) * fraction;
};

export const computeIqrFence = (values: number[], fenceMultiplier: number): IqrFence | null => {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  return {
    q1,
    q3,
    iqr,
    lower: q1 - fenceMultiplier * iqr,
    upper: q3 + fenceMultiplier * iqr
  };
};

/** Outlying values in their original order, repeats kept. */
export const detectOutliers = (
  values: (number | null)[],
  options: OutlierOptions = DEFAULT_OUTLIER_OPTIONS
): number[] => {
  const present = values.filter((value): value is number => value !== null && !Number.isNaN(value));
  if (present.length < options.minSamples) {
    return [];
  }
  const fence = computeIqrFence(present, options.fenceMultiplier);
  if (!fence || fence.iqr === 0) {
    return [];
  }
  return present.filter((value) => value < fence.lower || value > fence.upper);
};

const formatValue = (value: number): string => (Object.is(value, -0) ? "0" : String(value));

export const formatOutliers = (outliers: number[], format: OutlierFormat): string => {
  if (format === "list") {
    return `[${outliers.map(formatValue).join(", ")}]`;
  }
  if (outliers.length === 0) {
    return NO_OUTLIERS;
  }
  const distinct = Array.from(new Set(outliers)).sort((a, b) => a - b);
  return distinct.map(formatValue).join("; ");
};
