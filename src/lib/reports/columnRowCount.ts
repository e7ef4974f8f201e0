import { z } from "zod";
import { profileStructure } from "../profiling/structure";
import { formatTimestamp, NONE_MARKER } from "./format";
import { defineReport } from "./types";

const settingsSchema = z
  .object({
    noneMarker: z.string(),
    uniqueColumnSeparator: z.string()
  })
  .strict();

type ColumnRowCountSettings = z.infer<typeof settingsSchema>;

export const COLUMN_ROW_COUNT_HEADER = [
  "Table Name",
  "Unique Column(s)",
  "Column Count",
  "Row count",
  "Unique rows count",
  "Duplicate rows count",
  "Null count",
  "Date updated"
] as const;

export const columnRowCountReport = defineReport<ColumnRowCountSettings>({
  id: "column-row-count",
  description: "Row/column counts, duplicate rows, null count and single-column unique keys per table",
  outputName: "Column-RowCount-duplicate.csv",
  header: COLUMN_ROW_COUNT_HEADER,
  settingsSchema,
  defaults: {
    noneMarker: NONE_MARKER,
    uniqueColumnSeparator: ", "
  },
  build: (tables, settings) =>
    tables.map((table) => {
      const profile = profileStructure(table);
      const uniqueColumns =
        profile.uniqueColumns.length > 0
          ? profile.uniqueColumns.join(settings.uniqueColumnSeparator)
          : settings.noneMarker;
      return [
        table.name,
        uniqueColumns,
        profile.columnCount,
        profile.rowCount,
        profile.uniqueRowCount,
        profile.duplicateRowCount,
        profile.nullCount,
        formatTimestamp(table.modifiedAt)
      ];
    })
});
