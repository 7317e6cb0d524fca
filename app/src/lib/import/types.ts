import type { EquipmentRecord, RawEquipmentRow, RowIssue } from "../../types/dataset";

export type RawTable = {
  headers: string[];
  rows: string[][];
};

export type NormalizedRows = {
  // Every data row in file order, for display.
  rows: RawEquipmentRow[];
  // Rows that passed validation, for aggregation.
  valid: EquipmentRecord[];
  issues: RowIssue[];
  droppedCount: number;
};
