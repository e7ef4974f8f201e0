import { z } from "zod";
import { detectOutliers, formatOutliers } from "../profiling/outliers";
import { describeValues, presentStatistics } from "../profiling/statistics";
import { selectAnalysisColumns } from "./analysisColumns";
import { formatTimestamp } from "./format";
import {
  columnScopeSchema,
  identifierSettingsSchema,
  numericSettingsSchema,
  outlierSettingsSchema,
  statisticsSettingsSchema
} from "./settings";
import { defineReport, type ReportRow } from "./types";

const settingsSchema = z
  .object({
    scope: columnScopeSchema,
    numeric: numericSettingsSchema,
    identifier: identifierSettingsSchema,
    outliers: outlierSettingsSchema,
    statistics: statisticsSettingsSchema
  })
  .strict();

type OutlierStdSettings = z.infer<typeof settingsSchema>;

export const OUTLIERS_STD_HEADER = [
  "Table Name",
  "Numeric Column",
  "Average",
  "Standard Deviation",
  "list of outliers",
  "Date updated"
] as const;

export const outliersStdReport = defineReport<OutlierStdSettings>({
  id: "outliers-std",
  description: "Mean, standard deviation and IQR outliers for columns numeric in every table",
  outputName: "Outliers_STD.csv",
  header: OUTLIERS_STD_HEADER,
  settingsSchema,
  defaults: {
    scope: "common",
    numeric: { minNumericRatio: 0.9, stripThousandsSeparators: true },
    identifier: { nameKeywords: ["id"], nameMatch: "substring", uniqueness: null },
    outliers: {
      fenceMultiplier: 1.5,
      minSamples: 4,
      format: "summary",
      includeColumnsWithoutOutliers: true
    },
    statistics: { decimals: 1, variationCoefficient: "ratio" }
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
        const stats = describeValues(column.values);
        const shown = stats ? presentStatistics(stats, settings.statistics) : null;
        rows.push([
          table.name,
          column.name,
          shown?.mean ?? Number.NaN,
          shown?.standardDeviation ?? Number.NaN,
          formatOutliers(outliers, settings.outliers.format),
          dateUpdated
        ]);
      });
    });
    return rows;
  }
});
