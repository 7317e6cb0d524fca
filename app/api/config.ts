import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  DATA_FILE: z.string().min(1).default("data/store.json"),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(5),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  REQUIRE_AUTH: booleanFlag,
  CORS_ORIGIN: z.string().min(1).default("*")
});

export type ServerConfig = {
  port: number;
  dataFile: string;
  historyLimit: number;
  maxUploadBytes: number;
  requireAuth: boolean;
  corsOrigin: string;
};

export const MEMORY_STORE = ":memory:";

export const defaultConfig: ServerConfig = {
  port: 8000,
  dataFile: MEMORY_STORE,
  historyLimit: 5,
  maxUploadBytes: 5 * 1024 * 1024,
  requireAuth: false,
  corsOrigin: "*"
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid server configuration: ${issues}`);
  }
  const { data } = parsed;
  return {
    port: data.PORT,
    dataFile: data.DATA_FILE,
    historyLimit: data.HISTORY_LIMIT,
    maxUploadBytes: data.MAX_UPLOAD_BYTES,
    requireAuth: data.REQUIRE_AUTH,
    corsOrigin: data.CORS_ORIGIN
  };
};
