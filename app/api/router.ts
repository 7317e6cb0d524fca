import { isUploadRejection } from "../src/lib/import/errors";
import { loginHandler, logoutHandler, profileHandler, registerHandler } from "./auth";
import type { ApiDependencies, ApiHandler, HandlerContext } from "./context";
import { deleteDatasetHandler, getDatasetHandler, getLatestDatasetHandler } from "./dataset";
import { getHistoryHandler } from "./history";
import { downloadPdfHandler } from "./pdf";
import { resolveUser } from "./session";
import { getSummaryHandler } from "./summary";
import { uploadHandler } from "./upload";
import {
  ApiError,
  createRequestId,
  emptyResponse,
  errorResponse,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";
import { logFailure } from "./utils/log";

// "dataset" routes close to anonymous callers when requireAuth is set;
// "user" routes always need a token.
type Access = "public" | "dataset" | "user";

type Route = {
  method: string;
  path: string;
  pattern: RegExp;
  keys: string[];
  access: Access;
  handler: ApiHandler;
};

const escapeSegment = (segment: string) => segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const route = (method: string, path: string, access: Access, handler: ApiHandler): Route => {
  const keys: string[] = [];
  const source = path
    .split("/")
    .map((segment) => {
      if (segment.startsWith(":")) {
        keys.push(segment.slice(1));
        return "([^/]+)";
      }
      return escapeSegment(segment);
    })
    .join("/");
  return { method, path, pattern: new RegExp(`^${source}/?$`), keys, access, handler };
};

export const routes: Route[] = [
  route("POST", "/api/upload", "dataset", uploadHandler),
  route("GET", "/api/dataset/latest", "dataset", getLatestDatasetHandler),
  route("GET", "/api/dataset/:id", "dataset", getDatasetHandler),
  route("DELETE", "/api/dataset/:id", "dataset", deleteDatasetHandler),
  route("DELETE", "/api/dataset/:id/delete", "dataset", deleteDatasetHandler),
  route("GET", "/api/summary/:id", "dataset", getSummaryHandler),
  route("GET", "/api/history", "dataset", getHistoryHandler),
  route("GET", "/api/pdf/:id", "dataset", downloadPdfHandler),
  route("POST", "/api/auth/register", "public", registerHandler),
  route("POST", "/api/auth/login", "public", loginHandler),
  route("POST", "/api/auth/logout", "user", logoutHandler),
  route("GET", "/api/auth/profile", "user", profileHandler)
];

const ALLOWED_METHODS = "GET, POST, DELETE, OPTIONS";

const decodeParam = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

type RouteMatch =
  | { kind: "found"; route: Route; params: Record<string, string> }
  | { kind: "wrong-method"; allowed: string[] }
  | { kind: "not-found" };

export const matchRoute = (method: string, pathname: string): RouteMatch => {
  const allowed: string[] = [];
  for (const candidate of routes) {
    const match = candidate.pattern.exec(pathname);
    if (!match) {
      continue;
    }
    if (candidate.method !== method) {
      allowed.push(candidate.method);
      continue;
    }
    const params: Record<string, string> = {};
    candidate.keys.forEach((key, index) => {
      params[key] = decodeParam(match[index + 1] ?? "");
    });
    return { kind: "found", route: candidate, params };
  }
  return allowed.length > 0 ? { kind: "wrong-method", allowed } : { kind: "not-found" };
};

const scopeOf = (candidate: Route) => `${candidate.method} ${candidate.path}`;

/**
 * Builds the request listener for every /api route. Resolves to false for
 * paths outside /api so a host server can fall through to static files.
 */
export const createApiHandler = (deps: ApiDependencies) => {
  const { config, store } = deps;

  return async (req: ApiRequest, res: ApiResponse): Promise<boolean> => {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    if (pathname !== "/api" && !pathname.startsWith("/api/")) {
      return false;
    }

    const requestId = createRequestId();
    const method = (req.method ?? "GET").toUpperCase();
    res.setHeader("Access-Control-Allow-Origin", config.corsOrigin);
    res.setHeader("Access-Control-Allow-Headers", "Authorization, Content-Type");
    res.setHeader("Access-Control-Allow-Methods", ALLOWED_METHODS);

    if (method === "OPTIONS") {
      emptyResponse(res, 204);
      return true;
    }

    const match = matchRoute(method, pathname);
    if (match.kind === "not-found") {
      errorResponse(res, requestId, 404, "Not found");
      return true;
    }
    if (match.kind === "wrong-method") {
      res.setHeader("Allow", match.allowed.join(", "));
      errorResponse(res, requestId, 405, "Method Not Allowed");
      return true;
    }

    const { route: matched, params } = match;
    const scope = scopeOf(matched);
    try {
      const user = await resolveUser(req, store);
      const needsUser = matched.access === "user" || (matched.access === "dataset" && config.requireAuth);
      if (needsUser && !user) {
        throw new ApiError(401, "Authentication credentials were not provided.");
      }
      const ctx: HandlerContext = { ...deps, requestId, params, user };
      await matched.handler(req, res, ctx);
    } catch (error) {
      if (error instanceof ApiError) {
        logFailure(scope, requestId, error, error.message);
        errorResponse(res, requestId, error.status, error.message, error.details);
      } else if (isUploadRejection(error)) {
        logFailure(scope, requestId, error, error.message);
        errorResponse(res, requestId, 400, error.message, { code: error.code });
      } else {
        const message = error instanceof Error ? error.message : "Unknown error";
        logFailure(scope, requestId, error, message);
        errorResponse(res, requestId, 500, `Error processing request: ${message}`);
      }
    }
    return true;
  };
};
