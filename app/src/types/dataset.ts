export const MEASUREMENTS = ["flowrate", "pressure", "temperature"] as const;

export type Measurement = (typeof MEASUREMENTS)[number];

// Column labels of the upload format, in file order.
export const COLUMN_LABELS = {
  name: "Equipment Name",
  category: "Type",
  flowrate: "Flowrate",
  pressure: "Pressure",
  temperature: "Temperature"
} as const;

export type ColumnKey = keyof typeof COLUMN_LABELS;

export type CellValue = string | number | null;

/** One uploaded row as shown in the table view, valid or not. */
export type RawEquipmentRow = {
  "Equipment Name": CellValue;
  Type: CellValue;
  Flowrate: CellValue;
  Pressure: CellValue;
  Temperature: CellValue;
};

export type EquipmentRecord = {
  name: string;
  category: string;
  flowrate: number;
  pressure: number;
  temperature: number;
};

export type MeasurementStats = Record<Measurement, number | null>;

export type SummaryPayload = {
  total_count: number;
  averages: MeasurementStats;
  minimums: MeasurementStats;
  maximums: MeasurementStats;
  std_deviations: MeasurementStats;
  type_distribution: Record<string, number>;
  equipment_types: string[];
};

export type RowIssueCode = "EMPTY_NAME" | "MISSING_VALUE" | "NOT_NUMERIC" | "NOT_FINITE";

export type RowIssue = {
  row: number;
  column: ColumnKey;
  code: RowIssueCode;
  message: string;
};

export type DatasetPayload = {
  id: number;
  name: string;
  uploaded_at: string;
  uploaded_by_name: string;
  record_count: number;
  dropped_count: number;
  row_issues: RowIssue[];
  raw_data_parsed: RawEquipmentRow[];
  summary_parsed: SummaryPayload;
};

export type DatasetListEntry = Pick<
  DatasetPayload,
  "id" | "name" | "uploaded_at" | "record_count" | "summary_parsed"
>;

export type UploadResponse = {
  message: string;
  dataset: DatasetPayload;
};

export type SummaryResponse = {
  id: number;
  name: string;
  summary: SummaryPayload;
};

export type UserProfile = {
  id: number;
  username: string;
  email: string;
};

export type AuthResponse = {
  message: string;
  user: UserProfile;
  token: string;
};

export type ApiErrorBody = {
  error: string;
  requestId?: string;
  details?: unknown;
};
