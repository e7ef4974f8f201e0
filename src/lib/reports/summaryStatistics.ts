import { z } from "zod";
import { DEFAULT_ID_KEYWORDS } from "../profiling/identifier";
import { describeValues, presentStatistics } from "../profiling/statistics";
import { selectAnalysisColumns } from "./analysisColumns";
import { formatTimestamp } from "./format";
import {
  columnScopeSchema,
  identifierSettingsSchema,
  numericSettingsSchema,
  statisticsSettingsSchema
} from "./settings";
import { defineReport, type ReportRow } from "./types";

const settingsSchema = z
  .object({
    scope: columnScopeSchema,
    numeric: numericSettingsSchema,
    identifier: identifierSettingsSchema,
    statistics: statisticsSettingsSchema
  })
  .strict();

type SummaryStatisticsSettings = z.infer<typeof settingsSchema>;

export const SUMMARY_STATISTICS_HEADER = [
  "Table Name",
  "Numeric Column(s)",
  "Minimum",
  "maximum",
  "median",
  "Average",
  "Standard deviation",
  "Variation Coefficient",
  "Date updated"
] as const;

export const summaryStatisticsReport = defineReport<SummaryStatisticsSettings>({
  id: "summary-statistics",
  description: "Min, max, median, mean, sample standard deviation and variation coefficient per numeric column",
  outputName: "Summary_Statistics.csv",
  header: SUMMARY_STATISTICS_HEADER,
  settingsSchema,
  defaults: {
    scope: "table",
    numeric: { minNumericRatio: 0.9, stripThousandsSeparators: true },
    identifier: {
      nameKeywords: DEFAULT_ID_KEYWORDS,
      nameMatch: "substring",
      uniqueness: { minUniqueRatio: 0.995, minCoverage: 0.8, minSamples: 1, integersOnly: false }
    },
    statistics: { decimals: null, variationCoefficient: "ratio" }
  },
  build: (tables, settings) => {
    const rows: ReportRow[] = [];
    selectAnalysisColumns(tables, settings).forEach(({ table, columns }) => {
      const dateUpdated = formatTimestamp(table.modifiedAt);
      columns.forEach((column) => {
        const stats = describeValues(column.values);
        if (!stats) {
          return;
        }
        const shown = presentStatistics(stats, settings.statistics);
        rows.push([
          table.name,
          column.name,
          shown.minimum,
          shown.maximum,
          shown.median,
          shown.mean,
          shown.standardDeviation,
          shown.variationCoefficient,
          dateUpdated
        ]);
      });
    });
    return rows;
  }
});
