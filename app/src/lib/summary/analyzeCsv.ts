import type { RawEquipmentRow, RowIssue, SummaryPayload } from "../../types/dataset";
import { normalizeRows } from "../import/normalize";
import { parseCsvText } from "../import/parseCsv";
import { aggregateRecords } from "./aggregate";
import { materializeSummary } from "./materialize";

export type CsvAnalysis = {
  rows: RawEquipmentRow[];
  summary: SummaryPayload;
  issues: RowIssue[];
  droppedCount: number;
};

// Throws CsvFormatError or MissingColumnsError when the text is not an equipment table.
export const analyzeEquipmentCsv = (text: string): CsvAnalysis => {
  const normalized = normalizeRows(parseCsvText(text));
  const summary = materializeSummary(aggregateRecords(normalized.valid));
  return {
    rows: normalized.rows,
    summary,
    issues: normalized.issues,
    droppedCount: normalized.droppedCount
  };
};
