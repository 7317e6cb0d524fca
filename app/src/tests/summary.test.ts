import { describe, expect, it } from "vitest";
import { aggregateRecords, computeColumnStats, countCategories, roundStat } from "../lib/summary/aggregate";
import { analyzeEquipmentCsv } from "../lib/summary/analyzeCsv";
import { materializeSummary } from "../lib/summary/materialize";
import type { EquipmentRecord } from "../types/dataset";
import { EQUIPMENT_CSV } from "./fixtures";

const record = (
  name: string,
  category: string,
  flowrate: number,
  pressure = 1,
  temperature = 1
): EquipmentRecord => ({ name, category, flowrate, pressure, temperature });

const NULL_STATS = { flowrate: null, pressure: null, temperature: null };

describe("computeColumnStats", () => {
  it("computes population statistics", () => {
    expect(computeColumnStats([10, 20, 30])).toEqual({ min: 10, max: 30, mean: 20, std: 8.16 });
  });

  it("returns zero deviation for a single value", () => {
    expect(computeColumnStats([42])).toEqual({ min: 42, max: 42, mean: 42, std: 0 });
  });

  it("does not depend on input order", () => {
    const values = [0.1, 1e6, 0.2, 3.3, 0.3, 7];
    expect(computeColumnStats([...values].reverse())).toEqual(computeColumnStats(values));
  });

  it("rounds to two decimals", () => {
    expect(roundStat(2.111)).toBe(2.11);
    expect(computeColumnStats([2.111, 2.111]).mean).toBe(2.11);
  });

  it("rounds halves to the even neighbour", () => {
    expect(roundStat(0.125)).toBe(0.12);
    expect(roundStat(-0.125)).toBe(-0.12);
    expect(roundStat(0.135)).toBe(0.14);
    expect(roundStat(-0.001)).toBe(0);
  });

  it("keeps values too large to round", () => {
    expect(roundStat(1e200)).toBe(1e200);
    expect(computeColumnStats([1e308, 1e308])).toEqual({ min: 1e308, max: 1e308, mean: 1e308, std: 0 });
  });
});

describe("countCategories", () => {
  it("treats categories case-sensitively", () => {
    const counts = countCategories([record("a", "Pump", 1), record("b", "pump", 1), record("c", "Pump", 1)]);
    expect([...counts.entries()]).toEqual([
      ["Pump", 2],
      ["pump", 1]
    ]);
  });
});

describe("aggregateRecords", () => {
  it("returns an empty aggregate without rows", () => {
    const aggregate = aggregateRecords([]);
    expect(aggregate.totalCount).toBe(0);
    expect(aggregate.columns).toBeNull();
    expect(aggregate.typeDistribution.size).toBe(0);
  });

  it("gives the same summary for shuffled rows", () => {
    const rows = [record("a", "Pump", 10, 5), record("b", "Valve", 20, 6), record("c", "Pump", 30, 7)];
    const forward = materializeSummary(aggregateRecords(rows));
    const backward = materializeSummary(aggregateRecords([...rows].reverse()));
    expect(backward.averages).toEqual(forward.averages);
    expect(backward.std_deviations).toEqual(forward.std_deviations);
    expect(backward.type_distribution).toEqual(forward.type_distribution);
  });
});

describe("materializeSummary", () => {
  it("keeps every key with null values when nothing is valid", () => {
    expect(materializeSummary(aggregateRecords([]))).toEqual({
      total_count: 0,
      averages: NULL_STATS,
      minimums: NULL_STATS,
      maximums: NULL_STATS,
      std_deviations: NULL_STATS,
      type_distribution: {},
      equipment_types: []
    });
  });

  it("is stable across repeated calls", () => {
    const aggregate = aggregateRecords([record("a", "Pump", 1.5), record("b", "Tank", 2.5)]);
    expect(materializeSummary(aggregate)).toEqual(materializeSummary(aggregate));
  });
});

describe("analyzeEquipmentCsv", () => {
  it("summarizes a well-formed file", () => {
    const analysis = analyzeEquipmentCsv(EQUIPMENT_CSV);
    expect(analysis.droppedCount).toBe(0);
    expect(analysis.rows).toHaveLength(3);
    expect(analysis.summary).toEqual({
      total_count: 3,
      averages: { flowrate: 20, pressure: 6, temperature: 110 },
      minimums: { flowrate: 10, pressure: 5, temperature: 100 },
      maximums: { flowrate: 30, pressure: 7, temperature: 120 },
      std_deviations: { flowrate: 8.16, pressure: 0.82, temperature: 8.16 },
      type_distribution: { Pump: 2, Valve: 1 },
      equipment_types: ["Pump", "Valve"]
    });
  });

  it("counts only valid rows while keeping every raw row", () => {
    const analysis = analyzeEquipmentCsv(`${EQUIPMENT_CSV}\nBroken-1,Pump,n/a,5,100\n,Tank,1,1,1`);
    expect(analysis.rows).toHaveLength(5);
    expect(analysis.summary.total_count).toBe(3);
    expect(analysis.droppedCount).toBe(2);
    const distributed = Object.values(analysis.summary.type_distribution).reduce(
      (sum, count) => sum + count,
      0
    );
    expect(distributed).toBe(analysis.summary.total_count);
  });

  it("keeps finite statistics for very large measurements", () => {
    const analysis = analyzeEquipmentCsv(
      "Equipment Name,Type,Flowrate,Pressure,Temperature\nA,Pump,1e307,1e200,1\nB,Pump,1e307,-1e200,2"
    );
    const { summary } = analysis;
    expect(summary.averages).toEqual({ flowrate: 1e307, pressure: 0, temperature: 1.5 });
    expect(summary.minimums).toEqual({ flowrate: 1e307, pressure: -1e200, temperature: 1 });
    expect(summary.maximums).toEqual({ flowrate: 1e307, pressure: 1e200, temperature: 2 });
    expect(summary.std_deviations).toEqual({ flowrate: 0, pressure: 1e200, temperature: 0.5 });
    expect(JSON.parse(JSON.stringify(summary))).toEqual(summary);
  });

  it("returns null statistics when no row is valid", () => {
    const analysis = analyzeEquipmentCsv(
      "Equipment Name,Type,Flowrate,Pressure,Temperature\nPump-1,Pump,abc,5,100"
    );
    expect(analysis.summary.total_count).toBe(0);
    expect(analysis.summary.averages).toEqual(NULL_STATS);
    expect(analysis.rows).toHaveLength(1);
    expect(analysis.droppedCount).toBe(1);
    expect(analysis.issues).toEqual([
      { row: 1, column: "flowrate", code: "NOT_NUMERIC", message: 'Flowrate "abc" is not a number.' }
    ]);
  });
});
