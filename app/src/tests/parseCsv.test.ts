import { describe, expect, it } from "vitest";
import { CsvFormatError } from "../lib/import/errors";
import { parseCsvText } from "../lib/import/parseCsv";

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  return null;
};

describe("parseCsvText", () => {
  it("splits headers and rows", () => {
    expect(parseCsvText("a,b\n1,2\n3,4\n")).toEqual({
      headers: ["a", "b"],
      rows: [
        ["1", "2"],
        ["3", "4"]
      ]
    });
  });

  it("strips a byte order mark and handles CRLF line endings", () => {
    const table = parseCsvText("\uFEFFName,Type\r\nP-1,Pump\r\n");
    expect(table.headers).toEqual(["Name", "Type"]);
    expect(table.rows).toEqual([["P-1", "Pump"]]);
  });

  it("detects semicolon-delimited files", () => {
    expect(parseCsvText("a;b\n1,5;2").rows).toEqual([["1,5", "2"]]);
  });

  it("reads quoted fields with delimiters, escaped quotes and line breaks", () => {
    const table = parseCsvText('a,b\n"x, y","he said ""hi"""\n"line1\nline2",3');
    expect(table.rows).toEqual([
      ["x, y", 'he said "hi"'],
      ["line1\nline2", "3"]
    ]);
  });

  it("skips blank records and pads short rows", () => {
    const table = parseCsvText("a,b,c\n\n1\n,,\n4,5,6\n");
    expect(table.rows).toEqual([
      ["1", "", ""],
      ["4", "5", "6"]
    ]);
  });

  it("names blank header cells by position", () => {
    expect(parseCsvText(" a ,,c\n1,2,3").headers).toEqual(["a", "Column 2", "c"]);
  });

  it("tolerates empty trailing cells beyond the header width", () => {
    expect(parseCsvText("a,b\n1,2,,\n").rows).toEqual([["1", "2"]]);
  });

  it("rejects rows wider than the header", () => {
    const error = captureError(() => parseCsvText("a,b\n1,2\n3,4,5"));
    expect(error).toBeInstanceOf(CsvFormatError);
    expect(error).toMatchObject({ code: "CSV_TOO_MANY_FIELDS", line: 3 });
  });

  it("rejects empty input", () => {
    expect(captureError(() => parseCsvText(""))).toMatchObject({
      code: "CSV_EMPTY",
      message: "CSV appears to be empty."
    });
    expect(captureError(() => parseCsvText("\n\n"))).toMatchObject({ code: "CSV_EMPTY" });
  });

  it("rejects an unterminated quoted field", () => {
    expect(captureError(() => parseCsvText('a,b\n"oops,1'))).toMatchObject({
      code: "CSV_UNTERMINATED_QUOTE",
      line: 2
    });
  });
});
