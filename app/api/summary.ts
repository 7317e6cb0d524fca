import type { SummaryResponse } from "../src/types/dataset";
import type { ApiHandler } from "./context";
import { requireDataset } from "./dataset";
import { jsonResponse } from "./utils/http";

export const getSummaryHandler: ApiHandler = async (_req, res, ctx) => {
  const dataset = await requireDataset(ctx);
  const payload: SummaryResponse = {
    id: dataset.id,
    name: dataset.name,
    summary: dataset.summary
  };
  jsonResponse(res, 200, payload);
};
