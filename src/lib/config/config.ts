import { readFile } from "node:fs/promises";
import { z } from "zod";
import { REPORTS } from "../reports";
import { ConfigError, describeZodIssues } from "./errors";

export const DEFAULT_RAW_DIR = "./data/raw";
export const DEFAULT_PROCESSED_DIR = "./data/processed";

const reportOverridesSchema = z
  .object({
    "column-row-count": z.record(z.unknown()).optional(),
    outliers: z.record(z.unknown()).optional(),
    "outliers-std": z.record(z.unknown()).optional(),
    "summary-statistics": z.record(z.unknown()).optional()
  })
  .strict();

export const profilerConfigSchema = z
  .object({
    rawDir: z.string().min(1).default(DEFAULT_RAW_DIR),
    processedDir: z.string().min(1).default(DEFAULT_PROCESSED_DIR),
    onFileError: z.enum(["skip", "fail"]).default("skip"),
    reports: reportOverridesSchema.default({})
  })
  .strict();

export type ProfilerConfig = z.infer<typeof profilerConfigSchema>;

export type ConfigOverrides = Partial<Pick<ProfilerConfig, "rawDir" | "processedDir" | "onFileError">>;

const readConfigFile = async (configPath: string): Promise<object> => {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read config file ${configPath}`, [reason]);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
};

const fromEnv = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const values: Record<string, string> = {};
  if (env.PROFILER_RAW_DIR) {
    values.rawDir = env.PROFILER_RAW_DIR;
  }
  if (env.PROFILER_PROCESSED_DIR) {
    values.processedDir = env.PROFILER_PROCESSED_DIR;
  }
  if (env.PROFILER_ON_FILE_ERROR) {
    values.onFileError = env.PROFILER_ON_FILE_ERROR;
  }
  return values;
};

const dropUndefined = (overrides: ConfigOverrides): Record<string, string> =>
  Object.fromEntries(
    Object.entries(overrides).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );

/**
 * Resolves the run configuration: config file, then PROFILER_* env vars,
 * then explicit overrides (CLI flags). Report overrides are checked against
 * each report's settings schema up front.
 */
export const loadConfig = async ({
  configPath,
  env = process.env,
  overrides = {}
}: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
} = {}): Promise<ProfilerConfig> => {
  const fileValues = configPath ? await readConfigFile(configPath) : {};
  const parsed = profilerConfigSchema.safeParse({
    ...fileValues,
    ...fromEnv(env),
    ...dropUndefined(overrides)
  });
  if (!parsed.success) {
    throw new ConfigError("Invalid profiler configuration", describeZodIssues(parsed.error));
  }

  REPORTS.forEach((report) => report.validateSettings(parsed.data.reports[report.id]));
  return parsed.data;
};
