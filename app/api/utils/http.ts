import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

export type ApiRequest = {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  // Pre-parsed body, when a host framework already read it.
  body?: unknown;
} & Partial<AsyncIterable<Buffer | string>>;

export type ApiResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string | Buffer): unknown;
};

export class ApiError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }
}

export const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

export const jsonResponse = (res: ApiResponse, statusCode: number, payload: unknown) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

export const emptyResponse = (res: ApiResponse, statusCode: number) => {
  res.statusCode = statusCode;
  res.end();
};

export const errorResponse = (
  res: ApiResponse,
  requestId: string,
  statusCode: number,
  error: string,
  details?: unknown
) =>
  jsonResponse(res, statusCode, details === undefined ? { error, requestId } : { error, requestId, details });

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ApiError(400, "Request body is not valid JSON", error instanceof Error ? error.message : undefined);
  }
};

/** Reads and JSON-decodes the request body, refusing anything over `maxBytes`. */
export const readJsonBody = async (req: ApiRequest, maxBytes: number): Promise<unknown> => {
  if (req.body !== undefined && req.body !== null) {
    if (typeof req.body === "string") {
      return parseJson(req.body);
    }
    if (Buffer.isBuffer(req.body)) {
      return parseJson(req.body.toString("utf8"));
    }
    return req.body;
  }

  const iterator = req[Symbol.asyncIterator];
  if (!iterator) {
    return null;
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of { [Symbol.asyncIterator]: iterator.bind(req) }) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new ApiError(413, "File too large", { maxBytes });
    }
    chunks.push(buffer);
  }
  if (chunks.length === 0) {
    return null;
  }
  return parseJson(Buffer.concat(chunks).toString("utf8"));
};

export const getHeader = (req: ApiRequest, name: string): string | undefined => {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
};
