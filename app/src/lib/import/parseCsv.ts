import { CsvFormatError } from "./errors";
import type { RawTable } from "./types";

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (text: string): string => {
  const [headerLine = ""] = text.split("\n", 1);
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

type ParsedRecord = {
  line: number;
  cells: string[];
};

// Quoted fields may contain the delimiter, doubled quotes and line breaks.
const splitRecords = (text: string, delimiter: string): ParsedRecord[] => {
  const records: ParsedRecord[] = [];
  let cells: string[] = [];
  let current = "";
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"') {
      if (inQuotes && text[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "\n") {
      line += 1;
      if (inQuotes) {
        current += char;
        continue;
      }
      cells.push(current);
      records.push({ line: recordLine, cells });
      cells = [];
      current = "";
      recordLine = line;
      continue;
    }

    if (char === delimiter && !inQuotes) {
      cells.push(current);
      current = "";
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw new CsvFormatError(
      "CSV_UNTERMINATED_QUOTE",
      `Unterminated quoted field starting on line ${recordLine}.`,
      recordLine
    );
  }

  if (current.length > 0 || cells.length > 0) {
    cells.push(current);
    records.push({ line: recordLine, cells });
  }

  return records.filter((record) => record.cells.some((cell) => cell.trim().length > 0));
};

const buildHeaders = (rawHeaders: string[]): string[] =>
  rawHeaders.map((header, index) => {
    const trimmed = header.trim();
    return trimmed ? trimmed : `Column ${index + 1}`;
  });

/**
 * Splits CSV text into a header row and string cells. Short rows are padded
 * with empty cells; a row wider than the header makes the whole file
 * unreadable.
 */
export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const records = splitRecords(sanitized, detectDelimiter(sanitized));
  if (records.length === 0) {
    throw new CsvFormatError("CSV_EMPTY", "CSV appears to be empty.");
  }

  const [headerRecord, ...dataRecords] = records;
  const headers = buildHeaders(headerRecord.cells);
  const rows = dataRecords.map((record) => {
    const overflow = record.cells.slice(headers.length);
    if (overflow.some((cell) => cell.trim().length > 0)) {
      throw new CsvFormatError(
        "CSV_TOO_MANY_FIELDS",
        `Expected ${headers.length} fields on line ${record.line}, saw ${record.cells.length}.`,
        record.line
      );
    }
    return headers.map((_, index) => record.cells[index] ?? "");
  });

  return {
    headers,
    rows
  };
};
