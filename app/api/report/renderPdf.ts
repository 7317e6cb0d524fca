import PDFDocument from "pdfkit";
import {
  COLUMN_LABELS,
  MEASUREMENTS,
  type CellValue,
  type DatasetPayload,
  type MeasurementStats
} from "../../src/types/dataset";

type TableSpec = {
  headers: string[];
  rows: string[][];
  widths: number[];
  headerColor: string;
  bodyColor: string;
};

const ROW_HEIGHT = 20;
const GRID_COLOR = "#bdc3c7";

export const formatStat = (value: number | null): string => (value === null ? "N/A" : String(value));

const formatCell = (value: CellValue): string => (value === null ? "" : String(value));

export const formatUploadedAt = (iso: string): string => iso.replace("T", " ").slice(0, 19);

const drawRow = (
  doc: PDFKit.PDFDocument,
  cells: string[],
  widths: number[],
  fill: string,
  isHeader: boolean
) => {
  const top = doc.y;
  let left = doc.page.margins.left;
  cells.forEach((cell, index) => {
    const width = widths[index] ?? 80;
    doc.rect(left, top, width, ROW_HEIGHT).fillAndStroke(fill, GRID_COLOR);
    doc
      .fillColor(isHeader ? "#ffffff" : "#2c3e50")
      .font(isHeader ? "Helvetica-Bold" : "Helvetica")
      .fontSize(isHeader ? 10 : 9)
      .text(cell, left + 4, top + 6, {
        width: width - 8,
        height: ROW_HEIGHT - 6,
        align: "center",
        ellipsis: true,
        lineBreak: false
      });
    left += width;
  });
  doc.x = doc.page.margins.left;
  doc.y = top + ROW_HEIGHT;
};

// Repeats the header row after every page break.
const drawTable = (doc: PDFKit.PDFDocument, table: TableSpec) => {
  const bottom = () => doc.page.height - doc.page.margins.bottom;
  if (doc.y + ROW_HEIGHT * 2 > bottom()) {
    doc.addPage();
  }
  drawRow(doc, table.headers, table.widths, table.headerColor, true);
  table.rows.forEach((row) => {
    if (doc.y + ROW_HEIGHT > bottom()) {
      doc.addPage();
      drawRow(doc, table.headers, table.widths, table.headerColor, true);
    }
    drawRow(doc, row, table.widths, table.bodyColor, false);
  });
  doc.moveDown(1.5);
};

const heading = (doc: PDFKit.PDFDocument, text: string) => {
  doc.x = doc.page.margins.left;
  doc.fillColor("#34495e").font("Helvetica-Bold").fontSize(14).text(text);
  doc.moveDown(0.5);
};

const statsRow = (label: string, stats: MeasurementStats): string[] => [
  label,
  ...MEASUREMENTS.map((measurement) => formatStat(stats[measurement]))
];

export type PdfOptions = {
  compress?: boolean;
};

/**
 * Renders the stored summary and raw rows of one dataset. Reads values as
 * stored; nothing is recomputed.
 */
export const renderDatasetPdf = (dataset: DatasetPayload, options: PdfOptions = {}): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "A4",
      margins: { top: 36, bottom: 50, left: 50, right: 50 },
      compress: options.compress ?? true,
      info: { Title: `Chemical Equipment Parameter Report - ${dataset.name}` }
    });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    const summary = dataset.summary_parsed;

    doc.fillColor("#2c3e50").font("Helvetica-Bold").fontSize(18).text("Chemical Equipment Parameter Report");
    doc.moveDown(0.5);
    doc.font("Helvetica").fontSize(11).text(`Dataset: ${dataset.name}`);
    doc.text(`Uploaded: ${formatUploadedAt(dataset.uploaded_at)} UTC`);
    doc.text(`Rows: ${dataset.record_count} (valid: ${summary.total_count}, dropped: ${dataset.dropped_count})`);
    doc.moveDown(1.5);

    heading(doc, "Summary Statistics");
    drawTable(doc, {
      headers: ["Metric", "Flowrate", "Pressure", "Temperature"],
      rows: [
        statsRow("Average", summary.averages),
        statsRow("Minimum", summary.minimums),
        statsRow("Maximum", summary.maximums),
        statsRow("Std Dev", summary.std_deviations)
      ],
      widths: [110, 90, 90, 90],
      headerColor: "#3498db",
      bodyColor: "#ecf0f1"
    });

    heading(doc, "Equipment Type Distribution");
    drawTable(doc, {
      headers: ["Equipment Type", "Count"],
      rows: Object.entries(summary.type_distribution).map(([type, count]) => [type, String(count)]),
      widths: [150, 70],
      headerColor: "#27ae60",
      bodyColor: "#e8f6f3"
    });

    heading(doc, "Equipment Data");
    drawTable(doc, {
      headers: Object.values(COLUMN_LABELS),
      rows: dataset.raw_data_parsed.map((row) => [
        formatCell(row["Equipment Name"]),
        formatCell(row.Type),
        formatCell(row.Flowrate),
        formatCell(row.Pressure),
        formatCell(row.Temperature)
      ]),
      widths: [130, 95, 75, 75, 80],
      headerColor: "#9b59b6",
      bodyColor: "#f5eef8"
    });

    doc.end();
  });
