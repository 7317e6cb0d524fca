import type { EquipmentRecord, Measurement } from "../../types/dataset";

export const SUMMARY_PRECISION = 2;

export type ColumnStats = {
  min: number;
  max: number;
  mean: number;
  std: number;
};

export type Aggregate = {
  totalCount: number;
  // null when there are no valid rows.
  columns: Record<Measurement, ColumnStats> | null;
  // Keyed by the category exactly as written, in first-seen order.
  typeDistribution: Map<string, number>;
};

const factor = 10 ** SUMMARY_PRECISION;

// Above this magnitude a double has no fractional digits left to round.
const EXACT_LIMIT = 2 ** 53;

const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const remainder = value - floor;
  if (remainder !== 0.5) {
    return remainder < 0.5 ? floor : floor + 1;
  }
  return floor % 2 === 0 ? floor : floor + 1;
};

/** Rounds half to even at two decimals. Values too large to scale are returned as-is. */
export const roundStat = (value: number): number => {
  const scaled = value * factor;
  if (!Number.isFinite(scaled) || Math.abs(scaled) >= EXACT_LIMIT) {
    return value;
  }
  const rounded = roundHalfEven(scaled) / factor;
  return rounded === 0 ? 0 : rounded;
};

// Summing in ascending order makes the result independent of row order.
const sortedSum = (values: number[]): number =>
  [...values].sort((a, b) => a - b).reduce((sum, value) => sum + value, 0);

const meanAndDeviation = (values: number[]): { mean: number; std: number } => {
  const count = values.length;
  const mean = sortedSum(values) / count;
  const variance = sortedSum(values.map((value) => (value - mean) ** 2)) / count;
  return { mean, std: Math.sqrt(variance) };
};

// Works on values divided by the largest magnitude, so sums and squares stay finite.
const scaledMeanAndDeviation = (values: number[]): { mean: number; std: number } => {
  const scale = values.reduce((max, value) => Math.max(max, Math.abs(value)), 0);
  if (scale === 0) {
    return { mean: 0, std: 0 };
  }
  const unit = meanAndDeviation(values.map((value) => value / scale));
  return { mean: unit.mean * scale, std: unit.std * scale };
};

export const computeColumnStats = (values: number[]): ColumnStats => {
  const direct = meanAndDeviation(values);
  const { mean, std } =
    Number.isFinite(direct.mean) && Number.isFinite(direct.std) ? direct : scaledMeanAndDeviation(values);
  return {
    min: roundStat(values.reduce((min, value) => (value < min ? value : min), values[0])),
    max: roundStat(values.reduce((max, value) => (value > max ? value : max), values[0])),
    mean: roundStat(mean),
    std: roundStat(std)
  };
};

export const countCategories = (records: EquipmentRecord[]): Map<string, number> => {
  const counts = new Map<string, number>();
  records.forEach((record) => {
    counts.set(record.category, (counts.get(record.category) ?? 0) + 1);
  });
  return counts;
};

/**
 * Population statistics per measurement plus category counts. Values are
 * rounded here and nowhere else.
 */
export const aggregateRecords = (records: EquipmentRecord[]): Aggregate => {
  if (records.length === 0) {
    return { totalCount: 0, columns: null, typeDistribution: new Map() };
  }

  const statsFor = (measurement: Measurement) =>
    computeColumnStats(records.map((record) => record[measurement]));

  const columns: Record<Measurement, ColumnStats> = {
    flowrate: statsFor("flowrate"),
    pressure: statsFor("pressure"),
    temperature: statsFor("temperature")
  };

  return {
    totalCount: records.length,
    columns,
    typeDistribution: countCategories(records)
  };
};
