import type { z } from "zod";
import type { SourceTable } from "../import/types";
import { resolveSettings } from "./settings";

export type ReportId = "column-row-count" | "outliers" | "outliers-std" | "summary-statistics";

export type ReportCell = string | number;

export type ReportRow = ReportCell[];

export type ReportDefinition<TSettings> = {
  id: ReportId;
  description: string;
  outputName: string;
  header: readonly string[];
  settingsSchema: z.ZodType<TSettings>;
  defaults: TSettings;
  build: (tables: SourceTable[], settings: TSettings) => ReportRow[];
};

/** A report with its settings type erased, so differently-configured reports share one registry. */
export type Report = {
  id: ReportId;
  description: string;
  outputName: string;
  header: readonly string[];
  /** Throws ConfigError when the override does not fit the report's settings. */
  validateSettings: (override?: unknown) => void;
  build: (tables: SourceTable[], override?: unknown) => ReportRow[];
};

export const defineReport = <TSettings>(definition: ReportDefinition<TSettings>): Report => {
  const resolve = (override?: unknown): TSettings =>
    resolveSettings(definition.id, definition.settingsSchema, definition.defaults, override);

  return {
    id: definition.id,
    description: definition.description,
    outputName: definition.outputName,
    header: definition.header,
    validateSettings: (override) => {
      resolve(override);
    },
    build: (tables, override) => definition.build(tables, resolve(override))
  };
};
