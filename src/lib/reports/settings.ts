import { z } from "zod";
import { ConfigError, describeZodIssues } from "../config/errors";

const ratio = z.number().min(0).max(1);

export const numericSettingsSchema = z
  .object({
    minNumericRatio: ratio,
    stripThousandsSeparators: z.boolean()
  })
  .strict();

export const identifierSettingsSchema = z
  .object({
    nameKeywords: z.array(z.string().min(1)),
    nameMatch: z.enum(["substring", "token"]),
    uniqueness: z
      .object({
        minUniqueRatio: ratio,
        minCoverage: ratio,
        minSamples: z.number().int().min(1),
        integersOnly: z.boolean()
      })
      .strict()
      .nullable()
  })
  .strict();

export const outlierSettingsSchema = z
  .object({
    fenceMultiplier: z.number().positive(),
    minSamples: z.number().int().min(1),
    format: z.enum(["list", "summary"]),
    includeColumnsWithoutOutliers: z.boolean()
  })
  .strict();

export const statisticsSettingsSchema = z
  .object({
    decimals: z.number().int().min(0).max(12).nullable(),
    variationCoefficient: z.enum(["ratio", "percent"])
  })
  .strict();

export const columnScopeSchema = z.enum(["common", "table"]);

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Overlays a partial override on the defaults. Nested setting groups are
 * merged one level deep so `{ outliers: { fenceMultiplier: 2 } }` keeps the
 * rest of the outlier group.
 */
export const mergeSettings = (defaults: unknown, override: unknown): unknown => {
  if (override === undefined) {
    return defaults;
  }
  if (!isPlainObject(defaults) || !isPlainObject(override)) {
    return override;
  }
  const merged: Record<string, unknown> = { ...defaults };
  Object.entries(override).forEach(([key, value]) => {
    const base = defaults[key];
    merged[key] = isPlainObject(base) && isPlainObject(value) ? { ...base, ...value } : value;
  });
  return merged;
};

export const resolveSettings = <T>(
  reportId: string,
  schema: z.ZodType<T>,
  defaults: T,
  override?: unknown
): T => {
  const parsed = schema.safeParse(mergeSettings(defaults, override));
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings for report "${reportId}"`, describeZodIssues(parsed.error));
  }
  return parsed.data;
};
