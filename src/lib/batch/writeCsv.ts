import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import { formatCell } from "../reports/format";
import type { ReportRow } from "../reports/types";

/**
 * Serializes header + rows as CSV. Cells go into the sheet as pre-rendered
 * strings so numbers keep full precision instead of the "General" format.
 */
export const toCsvText = (header: readonly string[], rows: ReportRow[]): string => {
  const matrix: string[][] = [[...header], ...rows.map((row) => row.map(formatCell))];
  const sheet = XLSX.utils.aoa_to_sheet(matrix);
  return `${XLSX.utils.sheet_to_csv(sheet, { FS: ",", RS: "\n", blankrows: true })}\n`;
};

/** Writes through a temp file in the target directory and renames it into place. */
export const writeCsvAtomic = async (
  outputPath: string,
  header: readonly string[],
  rows: ReportRow[]
): Promise<void> => {
  const directory = path.dirname(outputPath);
  await mkdir(directory, { recursive: true });
  const tempPath = path.join(
    directory,
    `.${path.basename(outputPath)}.${process.pid}.${Date.now()}.tmp`
  );
  try {
    await writeFile(tempPath, toCsvText(header, rows), "utf8");
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
};
