import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { parseCsvText } from "../lib/import/parseCsv";
import { readUploadFile, xlsxToCsv } from "../lib/import/parseFile";
import { EQUIPMENT_CSV } from "./fixtures";

const buildWorkbook = (rows: (string | number)[][]): ArrayBuffer => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "Equipment");
  return XLSX.write(workbook, { type: "array", bookType: "xlsx" });
};

describe("xlsxToCsv", () => {
  it("converts the first sheet to CSV text", () => {
    const csv = xlsxToCsv(
      buildWorkbook([
        ["Equipment Name", "Type", "Flowrate", "Pressure", "Temperature"],
        ["Pump-1", "Pump", 10, 5, 100],
        ["Valve-1", "Valve", 30.5, 7, 120]
      ])
    );
    expect(parseCsvText(csv)).toEqual({
      headers: ["Equipment Name", "Type", "Flowrate", "Pressure", "Temperature"],
      rows: [
        ["Pump-1", "Pump", "10", "5", "100"],
        ["Valve-1", "Valve", "30.5", "7", "120"]
      ]
    });
  });
});

describe("readUploadFile", () => {
  it("reads CSV files as text", async () => {
    const source = await readUploadFile(new File([EQUIPMENT_CSV], "plant.csv", { type: "text/csv" }));
    expect(source).toEqual({ fileName: "plant.csv", content: EQUIPMENT_CSV });
  });

  it("rejects other extensions", async () => {
    await expect(readUploadFile(new File(["x"], "notes.txt"))).rejects.toThrow(
      "Unsupported file type. Please upload a .csv or .xlsx file."
    );
  });
});
