import { analyzeEquipmentCsv } from "../lib/summary/analyzeCsv";
import type { DatasetPayload } from "../types/dataset";

export const EQUIPMENT_CSV = [
  "Equipment Name,Type,Flowrate,Pressure,Temperature",
  "Pump-1,Pump,10,5,100",
  "Pump-2,Pump,20,6,110",
  "Valve-1,Valve,30,7,120"
].join("\n");

export const buildDatasetPayload = (csv: string, overrides: Partial<DatasetPayload> = {}): DatasetPayload => {
  const analysis = analyzeEquipmentCsv(csv);
  return {
    id: 1,
    name: "plant.csv",
    uploaded_at: "2024-03-01T08:30:00.000Z",
    uploaded_by_name: "Anonymous",
    record_count: analysis.rows.length,
    dropped_count: analysis.droppedCount,
    row_issues: analysis.issues,
    raw_data_parsed: analysis.rows,
    summary_parsed: analysis.summary,
    ...overrides
  };
};
