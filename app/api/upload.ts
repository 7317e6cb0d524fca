import { z } from "zod";
import { isUploadRejection, MissingColumnsError } from "../src/lib/import/errors";
import { analyzeEquipmentCsv, type CsvAnalysis } from "../src/lib/summary/analyzeCsv";
import type { ApiHandler } from "./context";
import { toDatasetPayload } from "./serialize";
import { errorResponse, jsonResponse, readJsonBody } from "./utils/http";
import { logFailure, logStart, logSuccess } from "./utils/log";

const acceptedExtension = /\.(csv|xlsx)$/i;

const uploadSchema = z
  .object({
    fileName: z.string().trim().min(1).max(255),
    name: z.string().trim().min(1).max(255).optional(),
    content: z.string()
  })
  .strict();

// JSON escaping can roughly double the size of CSV text on the wire.
const envelopeLimit = (maxUploadBytes: number) => maxUploadBytes * 2 + 1024;

export const uploadHandler: ApiHandler = async (req, res, ctx) => {
  const { requestId, config, store } = ctx;
  const body = await readJsonBody(req, envelopeLimit(config.maxUploadBytes));
  const validated = uploadSchema.safeParse(body);
  if (!validated.success) {
    logFailure("upload", requestId, validated.error, "Invalid request");
    errorResponse(res, requestId, 400, "No file provided. Please upload a CSV file.", validated.error.issues);
    return;
  }

  const { fileName, content } = validated.data;
  const bytes = Buffer.byteLength(content, "utf8");
  logStart("upload", requestId, { fileName, bytes, user: ctx.user?.username ?? null });

  if (!acceptedExtension.test(fileName)) {
    logFailure("upload", requestId, null, "Invalid file type");
    errorResponse(res, requestId, 400, "Invalid file type. Please upload a CSV file.");
    return;
  }
  if (bytes > config.maxUploadBytes) {
    logFailure("upload", requestId, null, "File too large");
    errorResponse(res, requestId, 413, "File too large", { maxBytes: config.maxUploadBytes });
    return;
  }

  let analysis: CsvAnalysis;
  try {
    analysis = analyzeEquipmentCsv(content);
  } catch (error) {
    if (!isUploadRejection(error)) {
      throw error;
    }
    logFailure("upload", requestId, error, "Upload rejected");
    errorResponse(
      res,
      requestId,
      400,
      error.message,
      error instanceof MissingColumnsError
        ? { code: error.code, missing: error.missing }
        : { code: error.code }
    );
    return;
  }

  const record = await store.createDataset({
    name: validated.data.name ?? fileName,
    uploadedBy: ctx.user?.id ?? null,
    rows: analysis.rows,
    summary: analysis.summary,
    issues: analysis.issues,
    droppedCount: analysis.droppedCount
  });

  logSuccess("upload", requestId, {
    datasetId: record.id,
    rows: record.rows.length,
    valid: record.summary.total_count,
    dropped: record.droppedCount
  });
  jsonResponse(res, 201, {
    message: "File uploaded and processed successfully",
    dataset: await toDatasetPayload(record, store)
  });
};
