import type { RawTable } from "../import/types";
import { numericColumnNames, type NumericCoercionOptions } from "./numeric";

const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const intersectColumnSets = (sets: Iterable<string>[]): string[] => {
  if (sets.length === 0) {
    return [];
  }
  const [first, ...rest] = sets.map((set) => new Set(set));
  const common = Array.from(first).filter((name) => rest.every((set) => set.has(name)));
  return common.sort(byCodePoint);
};

/** Column names classified numeric in every table of the batch. */
export const commonNumericColumns = (
  tables: RawTable[],
  options: NumericCoercionOptions
): string[] => intersectColumnSets(tables.map((table) => numericColumnNames(table, options)));
