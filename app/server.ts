import { createServer } from "node:http";
import { loadConfig } from "./api/config";
import { createApiHandler } from "./api/router";
import { openStore } from "./api/store";
import { errorResponse } from "./api/utils/http";

const start = async () => {
  const config = loadConfig();
  const store = await openStore(config.dataFile);
  const handleApi = createApiHandler({ config, store });

  const server = createServer((req, res) => {
    handleApi(req, res)
      .then((handled) => {
        if (!handled) {
          errorResponse(res, "static", 404, "Not found");
        }
      })
      .catch((error: unknown) => {
        console.error("[server] unhandled", error);
        if (!res.headersSent) {
          errorResponse(res, "unhandled", 500, "Internal server error");
        } else {
          res.end();
        }
      });
  });

  server.listen(config.port, () => {
    console.info("[server] listening", {
      port: config.port,
      dataFile: config.dataFile,
      requireAuth: config.requireAuth
    });
  });
};

start().catch((error: unknown) => {
  console.error("[server] failed to start", error);
  process.exitCode = 1;
});
