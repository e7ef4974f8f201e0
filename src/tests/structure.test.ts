import { describe, expect, it } from "vitest";
import type { RawTable } from "../lib/import/types";
import { getColumnValues } from "../lib/import/types";
import {
  countDuplicateRows,
  findUniqueColumns,
  profileStructure
} from "../lib/profiling/structure";

const tableOne: RawTable = {
  headers: ["id", "value"],
  rows: [
    [1, "a"],
    [1, "a"],
    [2, null]
  ]
};

const tableTwo: RawTable = {
  headers: ["pk", "x"],
  rows: [
    [10, 5],
    [11, 6],
    [12, 7]
  ]
};

describe("structural profile", () => {
  it("counts duplicates, nulls and unique columns", () => {
    expect(profileStructure(tableOne)).toEqual({
      columnCount: 2,
      rowCount: 3,
      nullCount: 1,
      duplicateRowCount: 1,
      uniqueRowCount: 2,
      uniqueColumns: []
    });
  });

  it("reports every single-column key", () => {
    expect(profileStructure(tableTwo)).toEqual({
      columnCount: 2,
      rowCount: 3,
      nullCount: 0,
      duplicateRowCount: 0,
      uniqueRowCount: 3,
      uniqueColumns: ["pk", "x"]
    });
  });

  it("treats null as equal to null when matching rows", () => {
    expect(
      countDuplicateRows([
        [null, 1],
        [null, 1],
        [null, 2]
      ])
    ).toBe(1);
  });

  it("does not match a number with its text form", () => {
    expect(countDuplicateRows([[1], ["1"]])).toBe(0);
  });

  it("never reports a column with nulls as a key", () => {
    const table: RawTable = { headers: ["code"], rows: [[1], [2], [null]] };
    expect(findUniqueColumns(table)).toEqual([]);
  });

  it("reports no keys for a table without rows", () => {
    expect(findUniqueColumns({ headers: ["a", "b"], rows: [] })).toEqual([]);
  });

  it("keeps the count invariants", () => {
    const table: RawTable = {
      headers: ["a", "b", "c"],
      rows: [
        [1, null, "x"],
        [1, null, "x"],
        [null, null, null],
        [2, 3, "y"],
        [null, null, null]
      ]
    };
    const profile = profileStructure(table);
    const expectedNulls = table.headers.reduce(
      (sum, _, index) =>
        sum + profile.rowCount - getColumnValues(table, index).filter((value) => value !== null).length,
      0
    );

    expect(profile.duplicateRowCount + profile.uniqueRowCount).toBe(profile.rowCount);
    expect(profile.duplicateRowCount).toBe(2);
    expect(profile.nullCount).toBe(expectedNulls);
    expect(profile.nullCount).toBe(8);
  });
});
