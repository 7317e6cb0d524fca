import type { ApiHandler } from "./context";
import { requireDataset } from "./dataset";
import { renderDatasetPdf } from "./report/renderPdf";
import { toDatasetPayload } from "./serialize";
import { logStart, logSuccess } from "./utils/log";

export const reportFileName = (datasetName: string): string =>
  `report_${datasetName.replace(/[\r\n"]/g, "_")}.pdf`;

const encodeExtValue = (value: string): string =>
  encodeURIComponent(value).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );

// Header values must stay Latin-1, so non-ASCII names travel in filename*.
export const contentDisposition = (fileName: string): string => {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeExtValue(fileName)}`;
};

export const downloadPdfHandler: ApiHandler = async (_req, res, ctx) => {
  const dataset = await requireDataset(ctx);
  logStart("pdf", ctx.requestId, { datasetId: dataset.id });
  const pdf = await renderDatasetPdf(await toDatasetPayload(dataset, ctx.store));
  logSuccess("pdf", ctx.requestId, { datasetId: dataset.id, bytes: pdf.length });
  res.statusCode = 200;
  res.setHeader("Content-Type", "application/pdf");
  res.setHeader("Content-Disposition", contentDisposition(reportFileName(dataset.name)));
  res.end(pdf);
};
