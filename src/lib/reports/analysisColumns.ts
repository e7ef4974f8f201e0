import type { SourceTable } from "../import/types";
import { getColumnByName } from "../import/types";
import { commonNumericColumns } from "../profiling/commonColumns";
import { isIdentifierColumn, type IdentifierOptions } from "../profiling/identifier";
import { coerceColumn, numericColumnNames, type NumericCoercionOptions } from "../profiling/numeric";

export type ColumnScope = "common" | "table";

export type AnalysisColumn = {
  name: string;
  values: (number | null)[];
};

export type TableColumns = {
  table: SourceTable;
  columns: AnalysisColumn[];
};

/**
 * Picks the numeric, non-identifier columns each table is analysed on.
 * "common" restricts every table to the batch-wide numeric intersection
 * (sorted by name); "table" keeps each table's own numeric columns in
 * header order.
 */
export const selectAnalysisColumns = (
  tables: SourceTable[],
  {
    scope,
    numeric,
    identifier
  }: { scope: ColumnScope; numeric: NumericCoercionOptions; identifier: IdentifierOptions }
): TableColumns[] => {
  const common = scope === "common" ? commonNumericColumns(tables, numeric) : null;

  return tables.map((table) => {
    const names = common ?? numericColumnNames(table, numeric);
    const columns: AnalysisColumn[] = [];
    names.forEach((name) => {
      const raw = getColumnByName(table, name);
      if (!raw) {
        return;
      }
      const values = coerceColumn(raw, numeric);
      if (isIdentifierColumn(name, values, identifier)) {
        return;
      }
      columns.push({ name, values });
    });
    return { table, columns };
  });
};
