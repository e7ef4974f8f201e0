export type CellValue = string | number | null;

export type RawTable = {
  headers: string[];
  rows: CellValue[][];
};

export type SourceTable = RawTable & {
  name: string;
  fileName: string;
  filePath: string;
  modifiedAt: Date;
};

export const getColumnValues = (table: RawTable, columnIndex: number): CellValue[] =>
  table.rows.map((row) => row[columnIndex] ?? null);

export const getColumnByName = (table: RawTable, columnName: string): CellValue[] | null => {
  const index = table.headers.indexOf(columnName);
  return index === -1 ? null : getColumnValues(table, index);
};
