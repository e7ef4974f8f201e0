import { z } from "zod";
import { detectOutliers, formatOutliers } from "../profiling/outliers";
import { selectAnalysisColumns } from "./analysisColumns";
import { formatTimestamp } from "./format";
import {
  columnScopeSchema,
  identifierSettingsSchema,
  numericSettingsSchema,
  outlierSettingsSchema
} from "./settings";
import { defineReport, type ReportRow } from "./types";

const settingsSchema = z
  .object({
    scope: columnScopeSchema,
    numeric: numericSettingsSchema,
    identifier: identifierSettingsSchema,
    outliers: outlierSettingsSchema
  })
  .strict();

type OutlierReportSettings = z.infer<typeof settingsSchema>;

export const OUTLIERS_HEADER = ["Table Name", "Numeric Column", "Outliers", "Date Updated"] as const;

/** Coarse screening pass: wide fence, raw outlier lists, only columns that have outliers. */
export const outliersReport = defineReport<OutlierReportSettings>({
  id: "outliers",
  description: "Coarse IQR outlier screen over columns numeric in every table",
  outputName: "Outliers.csv",
  header: OUTLIERS_HEADER,
  settingsSchema,
  defaults: {
    scope: "common",
    numeric: { minNumericRatio: 1, stripThousandsSeparators: false },
    identifier: {
      nameKeywords: ["id", "uuid", "key"],
      nameMatch: "substring",
      uniqueness: { minUniqueRatio: 0.9, minCoverage: 0, minSamples: 1, integersOnly: true }
    },
    outliers: {
      fenceMultiplier: 3,
      minSamples: 4,
      format: "list",
      includeColumnsWithoutOutliers: false
    }
  },
  build: (tables, settings) => {
    const rows: ReportRow[] = [];
    selectAnalysisColumns(tables, settings).forEach(({ table, columns }) => {
      const dateUpdated = formatTimestamp(table.modifiedAt);
      columns.forEach((column) => {
        const outliers = detectOutliers(column.values, settings.outliers);
        if (outliers.length === 0 && !settings.outliers.includeColumnsWithoutOutliers) {
          return;
        }
        rows.push([
          table.name,
          column.name,
          formatOutliers(outliers, settings.outliers.format),
          dateUpdated
        ]);
      });
    });
    return rows;
  }
});
