import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { isCsvFileName, loadTable, TableLoadError } from "../import/loadTable";
import type { SourceTable } from "../import/types";
import type { Report, ReportRow } from "../reports/types";
import { writeCsvAtomic } from "./writeCsv";

export type FileErrorPolicy = "skip" | "fail";

export type ProfilerLogger = Pick<Console, "info" | "warn" | "error">;

export type RunReportOptions = {
  rawDir: string;
  processedDir: string;
  outputName?: string;
  /** Partial settings overlaid on the report's defaults. */
  settings?: unknown;
  onFileError?: FileErrorPolicy;
  /** Most files loaded at the same time; defaults to LOAD_CONCURRENCY. */
  concurrency?: number;
  logger?: ProfilerLogger;
};

export type SkippedFile = {
  fileName: string;
  message: string;
};

export type RunReportResult = {
  report: Report["id"];
  outputPath: string;
  header: readonly string[];
  rows: ReportRow[];
  tableCount: number;
  skipped: SkippedFile[];
};

export class SourceDirectoryNotFoundError extends Error {
  directory: string;

  constructor(directory: string) {
    super(`Raw path not found: ${directory}`);
    this.name = "SourceDirectoryNotFoundError";
    this.directory = directory;
  }
}

const isMissingPathError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

const assertDirectory = async (directory: string): Promise<void> => {
  try {
    const info = await stat(directory);
    if (!info.isDirectory()) {
      throw new SourceDirectoryNotFoundError(directory);
    }
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new SourceDirectoryNotFoundError(directory);
    }
    throw error;
  }
};

const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Regular .csv files in the directory, sorted by name. */
export const listSourceFiles = async (rawDir: string): Promise<string[]> => {
  await assertDirectory(rawDir);
  const entries = await readdir(rawDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isCsvFileName(entry.name))
    .map((entry) => entry.name)
    .sort(byCodePoint);
};

/** Most source files open at the same time. */
export const LOAD_CONCURRENCY = 16;

// Running out of descriptors or memory says nothing about the file itself.
const RESOURCE_ERROR_CODES = new Set(["EMFILE", "ENFILE", "ENOMEM"]);

const isResourceError = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  RESOURCE_ERROR_CODES.has(error.code);

type LoadOutcome = { ok: true; table: SourceTable } | { ok: false; error: TableLoadError };

const loadOutcome = async (filePath: string): Promise<LoadOutcome> => {
  try {
    return { ok: true, table: await loadTable(filePath) };
  } catch (error) {
    if (error instanceof TableLoadError && !isResourceError(error.cause)) {
      return { ok: false, error };
    }
    throw error;
  }
};

/** Runs `task` over `items` with at most `limit` in flight; results keep input order. */
const mapInOrder = async <T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await task(items[index]);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
};

export type SourceBatch = {
  tables: SourceTable[];
  skipped: SkippedFile[];
};

export const loadSourceTables = async (
  rawDir: string,
  {
    onFileError = "skip",
    concurrency = LOAD_CONCURRENCY,
    logger = console
  }: Pick<RunReportOptions, "onFileError" | "concurrency" | "logger"> = {}
): Promise<SourceBatch> => {
  const fileNames = await listSourceFiles(rawDir);
  const outcomes = await mapInOrder(fileNames, concurrency, (fileName) =>
    loadOutcome(path.join(rawDir, fileName))
  );

  const tables: SourceTable[] = [];
  const skipped: SkippedFile[] = [];
  outcomes.forEach((outcome) => {
    if (outcome.ok) {
      tables.push(outcome.table);
      return;
    }
    if (onFileError === "fail") {
      throw outcome.error;
    }
    logger.warn("[profiler] skip", {
      fileName: outcome.error.fileName,
      message: outcome.error.message
    });
    skipped.push({ fileName: outcome.error.fileName, message: outcome.error.message });
  });

  return { tables, skipped };
};

const logStart = (logger: ProfilerLogger, reports: readonly Report[], options: RunReportOptions) => {
  logger.info("[profiler] start", {
    reports: reports.map((report) => report.id),
    rawDir: options.rawDir,
    onFileError: options.onFileError ?? "skip"
  });
};

const writeReport = async (
  report: Report,
  batch: SourceBatch,
  options: RunReportOptions,
  logger: ProfilerLogger
): Promise<RunReportResult> => {
  const rows = report.build(batch.tables, options.settings);

  const outputPath = path.join(options.processedDir, options.outputName ?? report.outputName);
  await writeCsvAtomic(outputPath, report.header, rows);

  logger.info("[profiler] done", {
    report: report.id,
    outputPath,
    tables: batch.tables.length,
    rows: rows.length,
    skipped: batch.skipped.length
  });

  return {
    report: report.id,
    outputPath,
    header: report.header,
    rows,
    tableCount: batch.tables.length,
    skipped: batch.skipped
  };
};

export const runReport = async (
  report: Report,
  options: RunReportOptions
): Promise<RunReportResult> => {
  const logger = options.logger ?? console;
  report.validateSettings(options.settings);
  logStart(logger, [report], options);

  const batch = await loadSourceTables(options.rawDir, { ...options, logger });
  return writeReport(report, batch, options, logger);
};

/** Loads the source directory once and writes each report from that batch, in order. */
export const runReports = async (
  reports: readonly Report[],
  options: Omit<RunReportOptions, "outputName" | "settings"> & {
    settings?: Partial<Record<Report["id"], unknown>>;
  }
): Promise<RunReportResult[]> => {
  const logger = options.logger ?? console;
  reports.forEach((report) => report.validateSettings(options.settings?.[report.id]));
  logStart(logger, reports, options);

  const batch = await loadSourceTables(options.rawDir, { ...options, logger });
  const results: RunReportResult[] = [];
  for (const report of reports) {
    results.push(
      await writeReport(report, batch, { ...options, settings: options.settings?.[report.id] }, logger)
    );
  }
  return results;
};
