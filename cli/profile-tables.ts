import { parseArgs } from "node:util";
import { runReports } from "../src/lib/batch/runReport";
import { loadConfig } from "../src/lib/config/config";
import { getReport, isReportId, REPORT_IDS, REPORTS } from "../src/lib/reports";
import type { Report } from "../src/lib/reports";

const usage = (): string =>
  [
    "Usage: profile-tables [report...] [--raw <dir>] [--out <dir>] [--config <file>] [--fail-fast]",
    "",
    "Reports:",
    ...REPORTS.map((report) => `  ${report.id.padEnd(20)} ${report.description} -> ${report.outputName}`)
  ].join("\n");

const resolveReports = (names: string[]): Report[] => {
  if (names.length === 0) {
    return [...REPORTS];
  }
  return names.map((name) => {
    if (!isReportId(name)) {
      throw new Error(`Unknown report "${name}". Expected one of: ${REPORT_IDS.join(", ")}`);
    }
    return getReport(name);
  });
};

const clearScreen = () => {
  if (process.stdout.isTTY) {
    console.clear();
  }
};

const main = async (): Promise<void> => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      raw: { type: "string" },
      out: { type: "string" },
      config: { type: "string" },
      "fail-fast": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });

  if (values.help) {
    console.log(usage());
    return;
  }

  const reports = resolveReports(positionals);
  const config = await loadConfig({
    configPath: values.config,
    overrides: {
      rawDir: values.raw,
      processedDir: values.out,
      onFileError: values["fail-fast"] ? "fail" : undefined
    }
  });

  clearScreen();
  console.log("The script is currently running, please wait...");

  const results = await runReports(reports, {
    rawDir: config.rawDir,
    processedDir: config.processedDir,
    onFileError: config.onFileError,
    settings: config.reports
  });

  results.forEach((result) => {
    console.log(`The output file ${result.outputPath} was exported (${result.rows.length} rows).`);
    result.skipped.forEach((file) => {
      console.log(`  skipped ${file.fileName}: ${file.message}`);
    });
  });
};

main().catch((error: unknown) => {
  console.error("[profile-tables] fail", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
