import type { PluginOption } from "vite";
import { loadConfig } from "./api/config";
import { createApiHandler } from "./api/router";
import { openStore } from "./api/store";

/** Serves the REST API from the Vite dev server, so the dashboard needs no proxy in dev. */
export const apiDevPlugin = (): PluginOption => ({
  name: "equipment-api-dev-endpoint",
  async configureServer(server) {
    const config = loadConfig();
    const store = await openStore(config.dataFile);
    const handleApi = createApiHandler({ config, store });

    server.middlewares.use((req, res, next) => {
      handleApi(req, res)
        .then((handled) => {
          if (!handled) {
            next();
          }
        })
        .catch((error: unknown) => {
          // surface the error in dev for visibility
          console.error("[api] dev handler error", error);
          next(error);
        });
    });
  }
});
