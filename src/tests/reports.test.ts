import { describe, expect, it } from "vitest";
import type { CellValue, SourceTable } from "../lib/import/types";
import { ConfigError } from "../lib/config/errors";
import { columnRowCountReport } from "../lib/reports/columnRowCount";
import { formatCell, formatTimestamp } from "../lib/reports/format";
import { getReport, isReportId, REPORT_IDS } from "../lib/reports";
import { outliersReport } from "../lib/reports/outliers";
import { outliersStdReport } from "../lib/reports/outliersStd";
import { summaryStatisticsReport } from "../lib/reports/summaryStatistics";

const MODIFIED_AT = new Date("2026-01-08T12:34:56.789Z");
const STAMP = "2026-01-08T12:34:56Z";

const buildTable = (name: string, headers: string[], rows: CellValue[][]): SourceTable => ({
  name,
  fileName: `${name}.csv`,
  filePath: `/data/raw/${name}.csv`,
  modifiedAt: MODIFIED_AT,
  headers,
  rows
});

const tableOne = buildTable(
  "table_one",
  ["id", "value", "other", "text"],
  [
    [1, 10, 1, "a"],
    [2, 11, 2, "b"],
    [3, 9, 3, "c"],
    [4, 10, 4, "d"],
    [5, 100, 5, "e"]
  ]
);

const tableTwo = buildTable(
  "table_two",
  ["id", "value", "other", "text"],
  [
    [10, 10, 2, "x"],
    [11, 10, 2.5, "y"],
    [12, 11, 3.5, "z"],
    [13, 9, 4.5, "w"],
    [14, 10, 5.5, "v"]
  ]
);

describe("report formatting", () => {
  it("renders timestamps as UTC seconds", () => {
    expect(formatTimestamp(MODIFIED_AT)).toBe(STAMP);
  });

  it("renders cells", () => {
    expect(formatCell(Number.NaN)).toBe("NaN");
    expect(formatCell(-0)).toBe("0");
    expect(formatCell(12.909944487358056)).toBe("12.909944487358056");
    expect(formatCell("None")).toBe("None");
  });
});

describe("report registry", () => {
  it("lists every report once", () => {
    expect(REPORT_IDS).toEqual(["column-row-count", "outliers", "outliers-std", "summary-statistics"]);
    expect(isReportId("outliers")).toBe(true);
    expect(isReportId("histogram")).toBe(false);
    expect(getReport("outliers-std").outputName).toBe("Outliers_STD.csv");
  });
});

describe("column row count report", () => {
  it("profiles each table", () => {
    const first = buildTable("table_one", ["id", "value"], [
      [1, "a"],
      [1, "a"],
      [2, null]
    ]);
    const second = buildTable("table_two", ["pk", "x"], [
      [10, 5],
      [11, 6],
      [12, 7]
    ]);

    expect(columnRowCountReport.build([first, second])).toEqual([
      ["table_one", "None", 2, 3, 2, 1, 1, STAMP],
      ["table_two", "pk, x", 2, 3, 3, 0, 0, STAMP]
    ]);
  });
});

describe("coarse outlier report", () => {
  it("lists raw outliers for columns that have them", () => {
    expect(outliersReport.build([tableOne, tableTwo])).toEqual([
      ["table_one", "value", "[100]", STAMP]
    ]);
  });

  it("can include columns without outliers", () => {
    const rows = outliersReport.build([tableOne, tableTwo], {
      outliers: { includeColumnsWithoutOutliers: true }
    });
    expect(rows).toEqual([
      ["table_one", "value", "[100]", STAMP],
      ["table_two", "other", "[]", STAMP],
      ["table_two", "value", "[]", STAMP]
    ]);
  });
});

describe("outlier report with statistics", () => {
  it("reports every common numeric, non-identifier column", () => {
    expect(outliersStdReport.build([tableOne, tableTwo])).toEqual([
      ["table_one", "other", 3, 1.6, "No Outliers", STAMP],
      ["table_one", "value", 28, 40.3, "100", STAMP],
      ["table_two", "other", 3.6, 1.4, "No Outliers", STAMP],
      ["table_two", "value", 10, 0.7, "No Outliers", STAMP]
    ]);
  });

  it("only analyses columns numeric in every table", () => {
    const textValue = buildTable("table_three", ["id", "value", "other"], [
      [1, "low", 1],
      [2, "high", 2],
      [3, "mid", 3],
      [4, "low", 4]
    ]);
    const columns = outliersStdReport
      .build([tableOne, textValue])
      .map((row) => `${row[0]}:${row[1]}`);
    expect(columns).toEqual(["table_one:other", "table_three:other"]);
  });

  it("produces nothing for an empty batch", () => {
    expect(outliersStdReport.build([])).toEqual([]);
  });

  it("rejects invalid overrides", () => {
    expect(() => outliersStdReport.build([tableOne], { outliers: { fenceMultiplier: -1 } })).toThrow(
      ConfigError
    );
    expect(() => outliersStdReport.validateSettings({ unknownSetting: true })).toThrow(ConfigError);
  });
});

describe("summary statistics report", () => {
  const people = buildTable("people", ["id", "age", "salary", "category", "amount"], [
    [1, 20, 30000, "A", "1,200"],
    [2, 20, 30000, "B", "1,200"],
    [3, 30, 50000, "A", "800"],
    [4, 30, 50000, "B", "800"]
  ]);

  it("describes numeric columns in header order and skips identifiers", () => {
    const rows = summaryStatisticsReport.build([people]);

    expect(rows.map((row) => row[1])).toEqual(["age", "salary", "amount"]);
    expect(rows[0].slice(0, 6)).toEqual(["people", "age", 20, 30, 25, 25]);
    expect(rows[0][6]).toBeCloseTo(5.773503, 6);
    expect(rows[0][7]).toBeCloseTo(0.23094, 5);
    expect(rows[0][8]).toBe(STAMP);
    expect(rows[2].slice(0, 6)).toEqual(["people", "amount", 800, 1200, 1000, 1000]);
  });

  it("treats all-distinct columns as identifiers by default", () => {
    const sales = buildTable("sales", ["customer_id", "value", "note"], [
      [1, 10, "foo"],
      [2, 20, "bar"],
      [3, 30, "baz"],
      [4, 40, "qux"]
    ]);

    expect(summaryStatisticsReport.build([sales])).toEqual([]);

    const rows = summaryStatisticsReport.build([sales], { identifier: { uniqueness: null } });
    expect(rows).toHaveLength(1);
    expect(rows[0].slice(0, 6)).toEqual(["sales", "value", 10, 40, 25, 25]);
    expect(rows[0][6]).toBeCloseTo(12.909944, 6);
    expect(rows[0][7]).toBeCloseTo(0.516398, 6);
  });

  it("reports NaN for degenerate columns", () => {
    const single = buildTable("single", ["reading"], [[7], [null]]);
    const rows = summaryStatisticsReport.build([single], { identifier: { uniqueness: null } });

    expect(rows).toHaveLength(1);
    expect(rows[0].slice(0, 6)).toEqual(["single", "reading", 7, 7, 7, 7]);
    expect(rows[0][6]).toBeNaN();
    expect(rows[0][7]).toBeNaN();
  });
});
