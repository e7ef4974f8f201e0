import type { ReportCell } from "./types";

export const NAN_MARKER = "NaN";

export const NONE_MARKER = "None";

export const formatTimestamp = (date: Date): string =>
  date.toISOString().replace(/\.\d{3}Z$/, "Z");

export const formatCell = (cell: ReportCell): string => {
  if (typeof cell === "string") {
    return cell;
  }
  if (Number.isNaN(cell)) {
    return NAN_MARKER;
  }
  return Object.is(cell, -0) ? "0" : String(cell);
};
