export type NameMatchMode = "substring" | "token";

export type UniquenessSignalOptions = {
  /** distinct / non-null must reach this ratio. */
  minUniqueRatio: number;
  /** non-null / total rows must reach this ratio. */
  minCoverage: number;
  minSamples: number;
  /** Only integer-valued columns can look like identifiers. */
  integersOnly: boolean;
};

export type IdentifierOptions = {
  nameKeywords: string[];
  nameMatch: NameMatchMode;
  uniqueness: UniquenessSignalOptions | null;
};

export const DEFAULT_ID_KEYWORDS = ["id", "key", "identifier", "uuid", "guid"];

export const DEFAULT_IDENTIFIER_OPTIONS: IdentifierOptions = {
  nameKeywords: DEFAULT_ID_KEYWORDS,
  nameMatch: "substring",
  uniqueness: {
    minUniqueRatio: 0.995,
    minCoverage: 0.8,
    minSamples: 1,
    integersOnly: false
  }
};

// "orderID" -> ["order", "id"], "user_id" -> ["user", "id"]
export const tokenizeColumnName = (name: string): string[] =>
  name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

export const nameSuggestsIdentifier = (
  name: string,
  keywords: string[],
  mode: NameMatchMode
): boolean => {
  const normalizedKeywords = keywords.map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
  if (mode === "token") {
    const tokens = new Set(tokenizeColumnName(name.trim()));
    return normalizedKeywords.some((keyword) => tokens.has(keyword));
  }
  const lowered = name.trim().toLowerCase();
  return normalizedKeywords.some((keyword) => lowered.includes(keyword));
};

export const valuesSuggestIdentifier = (
  values: (number | null)[],
  options: UniquenessSignalOptions
): boolean => {
  const present = values.filter((value): value is number => value !== null);
  if (present.length === 0 || present.length < options.minSamples) {
    return false;
  }
  if (options.integersOnly && !present.every((value) => Number.isInteger(value))) {
    return false;
  }
  const uniqueRatio = new Set(present).size / present.length;
  const coverage = present.length / values.length;
  return uniqueRatio >= options.minUniqueRatio && coverage >= options.minCoverage;
};

/**
 * Decides whether a numeric column holds row identifiers rather than
 * measurements. Either signal is enough.
 */
export const isIdentifierColumn = (
  name: string,
  values: (number | null)[],
  options: IdentifierOptions = DEFAULT_IDENTIFIER_OPTIONS
): boolean => {
  if (nameSuggestsIdentifier(name, options.nameKeywords, options.nameMatch)) {
    return true;
  }
  return options.uniqueness !== null && valuesSuggestIdentifier(values, options.uniqueness);
};
