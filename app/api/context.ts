import type { ServerConfig } from "./config";
import type { AppStore, UserRecord } from "./store";
import type { ApiRequest, ApiResponse } from "./utils/http";

export type ApiDependencies = {
  store: AppStore;
  config: ServerConfig;
};

export type HandlerContext = ApiDependencies & {
  requestId: string;
  params: Record<string, string>;
  user: UserRecord | null;
};

export type ApiHandler = (req: ApiRequest, res: ApiResponse, ctx: HandlerContext) => Promise<void>;
