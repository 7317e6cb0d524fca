import * as XLSX from "xlsx";

export type UploadSource = {
  fileName: string;
  content: string;
};

const fileExtension = (name: string): string => name.split(".").pop()?.toLowerCase() ?? "";

/** Converts the first worksheet of an XLSX workbook to CSV text. */
export const xlsxToCsv = (data: ArrayBuffer): string => {
  const workbook = XLSX.read(data, { type: "array" });
  const [sheetName] = workbook.SheetNames;
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new Error("No sheets detected in the XLSX file.");
  }
  return XLSX.utils.sheet_to_csv(sheet, { blankrows: false });
};

export const readUploadFile = async (file: File): Promise<UploadSource> => {
  const extension = fileExtension(file.name);
  if (extension === "csv") {
    return { fileName: file.name, content: await file.text() };
  }

  if (extension === "xlsx") {
    return { fileName: file.name, content: xlsxToCsv(await file.arrayBuffer()) };
  }

  throw new Error("Unsupported file type. Please upload a .csv or .xlsx file.");
};
