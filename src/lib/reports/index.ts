import { columnRowCountReport } from "./columnRowCount";
import { outliersReport } from "./outliers";
import { outliersStdReport } from "./outliersStd";
import { summaryStatisticsReport } from "./summaryStatistics";
import type { Report, ReportId } from "./types";

export const REPORTS: readonly Report[] = [
  columnRowCountReport,
  outliersReport,
  outliersStdReport,
  summaryStatisticsReport
];

export const REPORT_IDS: readonly ReportId[] = REPORTS.map((report) => report.id);

export const isReportId = (value: string): value is ReportId =>
  REPORT_IDS.some((id) => id === value);

export const getReport = (id: ReportId): Report => {
  const report = REPORTS.find((candidate) => candidate.id === id);
  if (!report) {
    throw new Error(`Unknown report: ${id}`);
  }
  return report;
};

export type { Report, ReportCell, ReportId, ReportRow } from "./types";
