import { describe, expect, it } from "vitest";
import { MissingColumnsError } from "../lib/import/errors";
import { normalizeRows, parseMeasurement, resolveColumns } from "../lib/import/normalize";

const HEADERS = ["Equipment Name", "Type", "Flowrate", "Pressure", "Temperature"];

describe("resolveColumns", () => {
  it("matches labels regardless of case, spacing and order", () => {
    expect(
      resolveColumns(["temperature", "equipment_name", " TYPE ", "Pressure", "Flowrate", "Notes"])
    ).toEqual({ name: 1, category: 2, flowrate: 4, pressure: 3, temperature: 0 });
  });

  it("lists every missing column", () => {
    let caught: unknown = null;
    try {
      resolveColumns(["Equipment Name", "Type"]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingColumnsError);
    expect(caught).toMatchObject({
      code: "MISSING_COLUMNS",
      missing: ["Flowrate", "Pressure", "Temperature"],
      message: "Missing required columns: Flowrate, Pressure, Temperature"
    });
  });
});

describe("parseMeasurement", () => {
  it("accepts decimal and exponent notation", () => {
    expect(parseMeasurement("12.5", "flowrate", 1)).toEqual({ ok: true, value: 12.5 });
    expect(parseMeasurement(".5", "flowrate", 1)).toEqual({ ok: true, value: 0.5 });
    expect(parseMeasurement("-3", "pressure", 1)).toEqual({ ok: true, value: -3 });
    expect(parseMeasurement("+2e3", "temperature", 1)).toEqual({ ok: true, value: 2000 });
  });

  it("reports empty, non-numeric and out-of-range cells", () => {
    expect(parseMeasurement("", "pressure", 4)).toEqual({
      ok: false,
      issue: { row: 4, column: "pressure", code: "MISSING_VALUE", message: "Pressure is empty." }
    });
    expect(parseMeasurement("abc", "flowrate", 2)).toEqual({
      ok: false,
      issue: { row: 2, column: "flowrate", code: "NOT_NUMERIC", message: 'Flowrate "abc" is not a number.' }
    });
    expect(parseMeasurement("1e999", "temperature", 3)).toEqual({
      ok: false,
      issue: {
        row: 3,
        column: "temperature",
        code: "NOT_FINITE",
        message: 'Temperature "1e999" is out of range.'
      }
    });
  });

  it("does not accept words or thousands separators as numbers", () => {
    expect(parseMeasurement("Infinity", "flowrate", 1).ok).toBe(false);
    expect(parseMeasurement("NaN", "flowrate", 1).ok).toBe(false);
    expect(parseMeasurement("1,5", "flowrate", 1).ok).toBe(false);
    expect(parseMeasurement("0x10", "flowrate", 1).ok).toBe(false);
  });
});

describe("normalizeRows", () => {
  const result = normalizeRows({
    headers: HEADERS,
    rows: [
      [" P-1 ", "Pump", "10", "5", "100"],
      ["P-2", "", "20", "6", "110"],
      ["", "Valve", "30", "7", "120"],
      ["P-4", "Pump", "abc", "8", ""]
    ]
  });

  it("keeps every row for display with trimmed and coerced cells", () => {
    expect(result.rows).toEqual([
      { "Equipment Name": "P-1", Type: "Pump", Flowrate: 10, Pressure: 5, Temperature: 100 },
      { "Equipment Name": "P-2", Type: null, Flowrate: 20, Pressure: 6, Temperature: 110 },
      { "Equipment Name": null, Type: "Valve", Flowrate: 30, Pressure: 7, Temperature: 120 },
      { "Equipment Name": "P-4", Type: "Pump", Flowrate: "abc", Pressure: 8, Temperature: null }
    ]);
  });

  it("keeps only complete rows for statistics", () => {
    expect(result.valid).toEqual([
      { name: "P-1", category: "Pump", flowrate: 10, pressure: 5, temperature: 100 },
      { name: "P-2", category: "", flowrate: 20, pressure: 6, temperature: 110 }
    ]);
    expect(result.droppedCount).toBe(2);
  });

  it("describes why each dropped row was excluded", () => {
    expect(result.issues.map((issue) => [issue.row, issue.code])).toEqual([
      [3, "EMPTY_NAME"],
      [4, "NOT_NUMERIC"],
      [4, "MISSING_VALUE"]
    ]);
  });

  it("reads columns by label when the file orders them differently", () => {
    const reordered = normalizeRows({
      headers: ["Temperature", "Pressure", "Flowrate", "Type", "Equipment Name"],
      rows: [["90", "4", "12", "Mixer", "M-1"]]
    });
    expect(reordered.valid).toEqual([
      { name: "M-1", category: "Mixer", flowrate: 12, pressure: 4, temperature: 90 }
    ]);
  });
});
