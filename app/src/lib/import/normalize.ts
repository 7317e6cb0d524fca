import {
  COLUMN_LABELS,
  type CellValue,
  type ColumnKey,
  type EquipmentRecord,
  type Measurement,
  type RawEquipmentRow,
  type RowIssue
} from "../../types/dataset";
import { MissingColumnsError } from "./errors";
import type { NormalizedRows, RawTable } from "./types";

const numericPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export type ColumnIndex = Record<ColumnKey, number>;

const headerKey = (value: string): string =>
  value.trim().toLowerCase().replace(/[\s_]+/g, " ");

/**
 * Locates the five equipment columns by label, ignoring case, surrounding
 * whitespace and runs of spaces/underscores. Extra columns are ignored.
 */
export const resolveColumns = (headers: string[]): ColumnIndex => {
  const keyed = headers.map(headerKey);
  const missing: string[] = [];
  const find = (key: ColumnKey): number => {
    const position = keyed.indexOf(headerKey(COLUMN_LABELS[key]));
    if (position === -1) {
      missing.push(COLUMN_LABELS[key]);
    }
    return position;
  };

  const index: ColumnIndex = {
    name: find("name"),
    category: find("category"),
    flowrate: find("flowrate"),
    pressure: find("pressure"),
    temperature: find("temperature")
  };

  if (missing.length > 0) {
    throw new MissingColumnsError(missing);
  }
  return index;
};

type ParsedMeasurement = { ok: true; value: number } | { ok: false; issue: RowIssue };

export const parseMeasurement = (
  raw: string,
  column: Measurement,
  row: number
): ParsedMeasurement => {
  const label = COLUMN_LABELS[column];
  if (raw === "") {
    return {
      ok: false,
      issue: { row, column, code: "MISSING_VALUE", message: `${label} is empty.` }
    };
  }
  if (!numericPattern.test(raw)) {
    return {
      ok: false,
      issue: { row, column, code: "NOT_NUMERIC", message: `${label} "${raw}" is not a number.` }
    };
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return {
      ok: false,
      issue: { row, column, code: "NOT_FINITE", message: `${label} "${raw}" is out of range.` }
    };
  }
  return { ok: true, value };
};

const toDisplayCell = (raw: string): CellValue => (raw === "" ? null : raw);

const toDisplayMeasurement = (raw: string, parsed: ParsedMeasurement): CellValue =>
  parsed.ok ? parsed.value : toDisplayCell(raw);

/**
 * Splits uploaded rows into the display list (every row, trimmed, numbers
 * coerced where they parse) and the valid subsequence used for statistics.
 * Invalid rows are never an error here; they are dropped from `valid` and
 * described in `issues`.
 */
export const normalizeRows = (table: RawTable): NormalizedRows => {
  const columns = resolveColumns(table.headers);
  const rows: RawEquipmentRow[] = [];
  const valid: EquipmentRecord[] = [];
  const issues: RowIssue[] = [];
  let droppedCount = 0;

  table.rows.forEach((cells, rowIndex) => {
    const rowNumber = rowIndex + 1;
    const cell = (key: ColumnKey) => (cells[columns[key]] ?? "").trim();
    const name = cell("name");
    const category = cell("category");
    const rowIssues: RowIssue[] = [];

    if (name === "") {
      rowIssues.push({
        row: rowNumber,
        column: "name",
        code: "EMPTY_NAME",
        message: `${COLUMN_LABELS.name} is empty.`
      });
    }

    const flowrate = parseMeasurement(cell("flowrate"), "flowrate", rowNumber);
    const pressure = parseMeasurement(cell("pressure"), "pressure", rowNumber);
    const temperature = parseMeasurement(cell("temperature"), "temperature", rowNumber);
    [flowrate, pressure, temperature].forEach((result) => {
      if (!result.ok) {
        rowIssues.push(result.issue);
      }
    });

    rows.push({
      "Equipment Name": toDisplayCell(name),
      Type: toDisplayCell(category),
      Flowrate: toDisplayMeasurement(cell("flowrate"), flowrate),
      Pressure: toDisplayMeasurement(cell("pressure"), pressure),
      Temperature: toDisplayMeasurement(cell("temperature"), temperature)
    });

    if (rowIssues.length > 0 || !flowrate.ok || !pressure.ok || !temperature.ok) {
      issues.push(...rowIssues);
      droppedCount += 1;
      return;
    }

    valid.push({
      name,
      category,
      flowrate: flowrate.value,
      pressure: pressure.value,
      temperature: temperature.value
    });
  });

  return { rows, valid, issues, droppedCount };
};
