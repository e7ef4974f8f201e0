import type { CellValue, RawTable } from "../import/types";
import { getColumnValues } from "../import/types";

export type StructuralProfile = {
  columnCount: number;
  rowCount: number;
  nullCount: number;
  duplicateRowCount: number;
  uniqueRowCount: number;
  uniqueColumns: string[];
};

// Typed key so 1 and "1" stay distinct while null matches null.
const cellKey = (value: CellValue): string => {
  if (value === null) {
    return "n:";
  }
  return typeof value === "number" ? `d:${value}` : `s:${value}`;
};

const rowKey = (row: CellValue[]): string => JSON.stringify(row.map(cellKey));

export const countDuplicateRows = (rows: CellValue[][]): number => {
  const seen = new Set<string>();
  let duplicates = 0;
  rows.forEach((row) => {
    const key = rowKey(row);
    if (seen.has(key)) {
      duplicates += 1;
      return;
    }
    seen.add(key);
  });
  return duplicates;
};

export const countNulls = (table: RawTable): number =>
  table.rows.reduce(
    (total, row) =>
      total + table.headers.reduce((sum, _, index) => sum + ((row[index] ?? null) === null ? 1 : 0), 0),
    0
  );

/** Single columns that identify every row on their own. */
export const findUniqueColumns = (table: RawTable): string[] => {
  const rowCount = table.rows.length;
  if (rowCount === 0) {
    return [];
  }
  return table.headers.filter((_, index) => {
    const values = getColumnValues(table, index);
    if (values.some((value) => value === null)) {
      return false;
    }
    return new Set(values.map(cellKey)).size === rowCount;
  });
};

export const profileStructure = (table: RawTable): StructuralProfile => {
  const rowCount = table.rows.length;
  const duplicateRowCount = countDuplicateRows(table.rows);
  return {
    columnCount: table.headers.length,
    rowCount,
    nullCount: countNulls(table),
    duplicateRowCount,
    uniqueRowCount: rowCount - duplicateRowCount,
    uniqueColumns: findUniqueColumns(table)
  };
};
