import type { Measurement, MeasurementStats, SummaryPayload } from "../../types/dataset";
import type { Aggregate, ColumnStats } from "./aggregate";

const pick = (aggregate: Aggregate, stat: keyof ColumnStats): MeasurementStats => {
  const { columns } = aggregate;
  const read = (measurement: Measurement) => (columns ? columns[measurement][stat] : null);
  return {
    flowrate: read("flowrate"),
    pressure: read("pressure"),
    temperature: read("temperature")
  };
};

/**
 * Shapes an aggregate into the summary object every view reads. Numbers are
 * copied as-is; an empty aggregate keeps the same keys with null values.
 */
export const materializeSummary = (aggregate: Aggregate): SummaryPayload => ({
  total_count: aggregate.totalCount,
  averages: pick(aggregate, "mean"),
  minimums: pick(aggregate, "min"),
  maximums: pick(aggregate, "max"),
  std_deviations: pick(aggregate, "std"),
  type_distribution: Object.fromEntries(aggregate.typeDistribution),
  equipment_types: [...aggregate.typeDistribution.keys()]
});
