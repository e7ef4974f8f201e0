import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { parseCsvText } from "./parseCsv";
import type { SourceTable } from "./types";

export class TableLoadError extends Error {
  fileName: string;

  constructor(fileName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not load ${fileName}: ${reason}`, { cause });
    this.name = "TableLoadError";
    this.fileName = fileName;
  }
}

const fileExtension = (name: string): string => path.extname(name).toLowerCase();

export const isCsvFileName = (name: string): boolean => fileExtension(name) === ".csv";

export const tableNameFromFile = (fileName: string): string =>
  path.basename(fileName, path.extname(fileName));

export const loadTable = async (filePath: string): Promise<SourceTable> => {
  const fileName = path.basename(filePath);
  try {
    const [text, info] = await Promise.all([readFile(filePath, "utf8"), stat(filePath)]);
    const table = parseCsvText(text);
    return {
      ...table,
      name: tableNameFromFile(fileName),
      fileName,
      filePath,
      modifiedAt: info.mtime
    };
  } catch (error) {
    throw new TableLoadError(fileName, error);
  }
};
