import type { ApiHandler } from "./context";
import { toListEntry } from "./serialize";
import { jsonResponse } from "./utils/http";

export const getHistoryHandler: ApiHandler = async (_req, res, ctx) => {
  const datasets = await ctx.store.listRecentDatasets(ctx.config.historyLimit);
  jsonResponse(res, 200, datasets.map(toListEntry));
};
