export type CsvFormatErrorCode = "CSV_EMPTY" | "CSV_UNTERMINATED_QUOTE" | "CSV_TOO_MANY_FIELDS";

export class CsvFormatError extends Error {
  code: CsvFormatErrorCode;
  line?: number;

  constructor(code: CsvFormatErrorCode, message: string, line?: number) {
    super(message);
    this.name = "CsvFormatError";
    this.code = code;
    this.line = line;
  }
}

export class MissingColumnsError extends Error {
  code = "MISSING_COLUMNS" as const;
  missing: string[];

  constructor(missing: string[]) {
    super(`Missing required columns: ${missing.join(", ")}`);
    this.name = "MissingColumnsError";
    this.missing = missing;
  }
}

/** True for errors that mean "this upload cannot be read as equipment data". */
export const isUploadRejection = (
  error: unknown
): error is CsvFormatError | MissingColumnsError =>
  error instanceof CsvFormatError || error instanceof MissingColumnsError;
