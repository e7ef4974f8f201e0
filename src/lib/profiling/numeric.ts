import type { CellValue, RawTable } from "../import/types";
import { getColumnValues } from "../import/types";

export type NumericCoercionOptions = {
  /** Share of non-null cells that must parse as numbers, 0..1. */
  minNumericRatio: number;
  /** Drop "," grouping characters before parsing, so "1,234" reads as 1234. */
  stripThousandsSeparators: boolean;
};

export const DEFAULT_NUMERIC_OPTIONS: NumericCoercionOptions = {
  minNumericRatio: 0.9,
  stripThousandsSeparators: true
};

const numericPattern = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export const parseNumericCell = (
  value: CellValue,
  options: Pick<NumericCoercionOptions, "stripThousandsSeparators"> = DEFAULT_NUMERIC_OPTIONS
): number | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  let cleaned = trimmed.replace(/\s+/g, "");
  if (options.stripThousandsSeparators) {
    cleaned = cleaned.replace(/,/g, "");
  }
  if (!numericPattern.test(cleaned)) {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

export const coerceColumn = (
  values: CellValue[],
  options: Pick<NumericCoercionOptions, "stripThousandsSeparators"> = DEFAULT_NUMERIC_OPTIONS
): (number | null)[] => values.map((value) => parseNumericCell(value, options));

const isPresent = (value: CellValue): boolean =>
  value !== null && !(typeof value === "string" && value.trim() === "");

export const isNumericColumn = (
  values: CellValue[],
  options: NumericCoercionOptions = DEFAULT_NUMERIC_OPTIONS
): boolean => {
  let nonNullCount = 0;
  let numericCount = 0;

  values.forEach((value) => {
    if (!isPresent(value)) {
      return;
    }
    nonNullCount += 1;
    if (parseNumericCell(value, options) !== null) {
      numericCount += 1;
    }
  });

  if (nonNullCount === 0) {
    return false;
  }
  return numericCount / nonNullCount >= options.minNumericRatio;
};

export const numericColumnNames = (
  table: RawTable,
  options: NumericCoercionOptions = DEFAULT_NUMERIC_OPTIONS
): string[] =>
  table.headers.filter((_, index) => isNumericColumn(getColumnValues(table, index), options));
