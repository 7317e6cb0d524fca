import type { ApiHandler, HandlerContext } from "./context";
import type { DatasetRecord } from "./store";
import { toDatasetPayload } from "./serialize";
import { ApiError, emptyResponse, jsonResponse } from "./utils/http";
import { logStart, logSuccess } from "./utils/log";

export const parseDatasetId = (raw: string | undefined): number => {
  const id = Number(raw);
  if (!raw || !/^\d+$/.test(raw) || !Number.isSafeInteger(id) || id < 1) {
    throw new ApiError(404, "Dataset not found");
  }
  return id;
};

export const requireDataset = async (ctx: HandlerContext): Promise<DatasetRecord> => {
  const dataset = await ctx.store.getDataset(parseDatasetId(ctx.params.id));
  if (!dataset) {
    throw new ApiError(404, "Dataset not found");
  }
  return dataset;
};

export const getDatasetHandler: ApiHandler = async (_req, res, ctx) => {
  const dataset = await requireDataset(ctx);
  jsonResponse(res, 200, await toDatasetPayload(dataset, ctx.store));
};

// Replaces client-side "last uploaded" state with a query against the store.
export const getLatestDatasetHandler: ApiHandler = async (_req, res, ctx) => {
  const dataset = await ctx.store.getLatestDataset();
  if (!dataset) {
    throw new ApiError(404, "No datasets found");
  }
  jsonResponse(res, 200, await toDatasetPayload(dataset, ctx.store));
};

export const deleteDatasetHandler: ApiHandler = async (_req, res, ctx) => {
  const id = parseDatasetId(ctx.params.id);
  logStart("dataset-delete", ctx.requestId, { datasetId: id });
  const deleted = await ctx.store.deleteDataset(id);
  if (!deleted) {
    throw new ApiError(404, "Dataset not found");
  }
  logSuccess("dataset-delete", ctx.requestId, { datasetId: id });
  emptyResponse(res, 204);
};
