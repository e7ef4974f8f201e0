import type { CellValue, RawTable } from "./types";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

// Markers read as missing values, on top of the empty cell.
const NULL_MARKERS = new Set([
  "#N/A",
  "#N/A N/A",
  "#NA",
  "<NA>",
  "N/A",
  "n/a",
  "NA",
  "NULL",
  "null",
  "NaN",
  "nan",
  "-NaN",
  "-nan",
  "-1.#IND",
  "-1.#QNAN",
  "1.#IND",
  "1.#QNAN",
  "None"
]);

export class CsvParseError extends Error {
  line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = "CsvParseError";
    this.line = line;
  }
}

type ParsedRecord = {
  line: number;
  fields: string[];
};

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (headerLine: string): string => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

const isBlankRecord = (fields: string[]): boolean =>
  fields.length === 1 && fields[0].trim().length === 0;

const splitRecords = (text: string, delimiter: string): ParsedRecord[] => {
  const records: ParsedRecord[] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;
  let fieldStart = true;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    fields.push(current);
    if (!isBlankRecord(fields)) {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    current = "";
    fieldStart = true;
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"' && inQuotes) {
      if (text[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }
    // Only a quote at the start of a field opens a quoted field; elsewhere it is literal.
    if (char === '"' && fieldStart) {
      inQuotes = true;
      fieldStart = false;
      continue;
    }
    fieldStart = false;

    if (char === "\n") {
      line += 1;
      if (inQuotes) {
        current += char;
        continue;
      }
      endRecord();
      recordLine = line;
      continue;
    }

    if (char === delimiter && !inQuotes) {
      fields.push(current);
      current = "";
      fieldStart = true;
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw new CsvParseError("Unterminated quoted field", recordLine);
  }
  if (current.length > 0 || fields.length > 0) {
    endRecord();
  }
  return records;
};

export const coerceCell = (value: string): CellValue => {
  const trimmed = value.trim();
  if (!trimmed || NULL_MARKERS.has(trimmed)) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return trimmed;
};

export const buildHeaders = (rawHeaders: string[]): string[] => {
  const seen = new Map<string, number>();
  return rawHeaders.map((header, index) => {
    const trimmed = header.trim();
    const base = trimmed ? trimmed : `Column ${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
};

export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const firstLine = sanitized.split("\n").find((line) => line.trim().length > 0);
  if (firstLine === undefined) {
    throw new CsvParseError("CSV appears to be empty", 1);
  }

  const delimiter = detectDelimiter(firstLine);
  const [headerRecord, ...dataRecords] = splitRecords(sanitized, delimiter);
  if (!headerRecord) {
    throw new CsvParseError("CSV has no header row", 1);
  }
  const headers = buildHeaders(headerRecord.fields);

  const rows = dataRecords.map(({ line, fields }) => {
    if (fields.length > headers.length) {
      throw new CsvParseError(
        `Expected ${headers.length} fields but found ${fields.length}`,
        line
      );
    }
    return headers.map((_, index) => coerceCell(fields[index] ?? ""));
  });

  return {
    headers,
    rows
  };
};
