import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { MEMORY_STORE } from "./config";
import type { RawEquipmentRow, RowIssue, SummaryPayload } from "../src/types/dataset";

export type DatasetRecord = {
  id: number;
  name: string;
  uploadedAt: string;
  uploadedBy: number | null;
  rows: RawEquipmentRow[];
  summary: SummaryPayload;
  issues: RowIssue[];
  droppedCount: number;
};

export type NewDataset = Omit<DatasetRecord, "id" | "uploadedAt">;

export type UserRecord = {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: string;
};

export type NewUser = Pick<UserRecord, "username" | "email" | "passwordHash">;

export type TokenRecord = {
  key: string;
  userId: number;
  createdAt: string;
};

export type StoreState = {
  nextDatasetId: number;
  nextUserId: number;
  datasets: DatasetRecord[];
  users: UserRecord[];
  tokens: TokenRecord[];
};

export type AppStore = {
  createDataset: (input: NewDataset) => Promise<DatasetRecord>;
  getDataset: (id: number) => Promise<DatasetRecord | null>;
  getLatestDataset: () => Promise<DatasetRecord | null>;
  listRecentDatasets: (limit: number) => Promise<DatasetRecord[]>;
  deleteDataset: (id: number) => Promise<boolean>;
  createUser: (input: NewUser) => Promise<UserRecord>;
  findUserByUsername: (username: string) => Promise<UserRecord | null>;
  findUserById: (id: number) => Promise<UserRecord | null>;
  getOrCreateToken: (userId: number, createKey: () => string) => Promise<TokenRecord>;
  findUserByToken: (key: string) => Promise<UserRecord | null>;
  deleteToken: (userId: number) => Promise<boolean>;
};

export class DuplicateUserError extends Error {
  constructor(username: string) {
    super(`A user with username "${username}" already exists.`);
    this.name = "DuplicateUserError";
  }
}

export const emptyStoreState = (): StoreState => ({
  nextDatasetId: 1,
  nextUserId: 1,
  datasets: [],
  users: [],
  tokens: []
});

// Ids are handed out in creation order, so a higher id is always newer.
const newestFirst = (a: DatasetRecord, b: DatasetRecord) => b.id - a.id;

/**
 * Store over a plain state object. Commits run one at a time against a copy
 * of the committed state, and the copy replaces it only after `persist`
 * succeeds, so a failed write leaves no trace in memory or on disk.
 */
export const createMemoryStore = (
  initial: StoreState = emptyStoreState(),
  persist?: (state: StoreState) => Promise<void>
): AppStore => {
  let state = initial;
  let queue: Promise<void> = Promise.resolve();

  const commit = <T>(apply: (draft: StoreState) => T): Promise<T> => {
    const run = async (): Promise<T> => {
      const draft: StoreState = {
        ...state,
        datasets: [...state.datasets],
        users: [...state.users],
        tokens: [...state.tokens]
      };
      const result = apply(draft);
      if (persist) {
        await persist(draft);
      }
      state = draft;
      return result;
    };
    const next = queue.then(run);
    // The caller gets the failure through `next`; the queue only orders commits.
    queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  };

  const findUser = (predicate: (user: UserRecord) => boolean) =>
    state.users.find(predicate) ?? null;

  return {
    createDataset: (input) =>
      commit((draft) => {
        const record: DatasetRecord = {
          ...input,
          id: draft.nextDatasetId,
          uploadedAt: new Date().toISOString()
        };
        draft.nextDatasetId += 1;
        draft.datasets.push(record);
        return record;
      }),
    getDataset: async (id) => state.datasets.find((dataset) => dataset.id === id) ?? null,
    getLatestDataset: async () => [...state.datasets].sort(newestFirst)[0] ?? null,
    listRecentDatasets: async (limit) => [...state.datasets].sort(newestFirst).slice(0, limit),
    deleteDataset: async (id) => {
      if (!state.datasets.some((dataset) => dataset.id === id)) {
        return false;
      }
      return commit((draft) => {
        const before = draft.datasets.length;
        draft.datasets = draft.datasets.filter((dataset) => dataset.id !== id);
        return draft.datasets.length < before;
      });
    },
    createUser: (input) =>
      commit((draft) => {
        if (draft.users.some((user) => user.username === input.username)) {
          throw new DuplicateUserError(input.username);
        }
        const record: UserRecord = {
          ...input,
          id: draft.nextUserId,
          createdAt: new Date().toISOString()
        };
        draft.nextUserId += 1;
        draft.users.push(record);
        return record;
      }),
    findUserByUsername: async (username) => findUser((user) => user.username === username),
    findUserById: async (id) => findUser((user) => user.id === id),
    getOrCreateToken: async (userId, createKey) => {
      const existing = state.tokens.find((token) => token.userId === userId);
      if (existing) {
        return existing;
      }
      return commit((draft) => {
        const current = draft.tokens.find((token) => token.userId === userId);
        if (current) {
          return current;
        }
        const token: TokenRecord = { key: createKey(), userId, createdAt: new Date().toISOString() };
        draft.tokens.push(token);
        return token;
      });
    },
    findUserByToken: async (key) => {
      const token = state.tokens.find((entry) => entry.key === key);
      return token ? findUser((user) => user.id === token.userId) : null;
    },
    deleteToken: async (userId) => {
      if (!state.tokens.some((token) => token.userId === userId)) {
        return false;
      }
      return commit((draft) => {
        const before = draft.tokens.length;
        draft.tokens = draft.tokens.filter((token) => token.userId !== userId);
        return draft.tokens.length < before;
      });
    }
  };
};

const cellSchema = z.union([z.string(), z.number(), z.null()]);
// Rebuilt with Object.fromEntries so categories such as "__proto__" stay own keys.
const distributionSchema = z
  .preprocess(
    (value) =>
      typeof value === "object" && value !== null && !Array.isArray(value) ? Object.entries(value) : value,
    z.array(z.tuple([z.string(), z.number().int().nonnegative()]))
  )
  .transform((entries): Record<string, number> => Object.fromEntries(entries));

const statsSchema = z.object({
  flowrate: z.number().nullable(),
  pressure: z.number().nullable(),
  temperature: z.number().nullable()
});

const stateSchema = z.object({
  nextDatasetId: z.number().int().positive(),
  nextUserId: z.number().int().positive(),
  datasets: z.array(
    z.object({
      id: z.number().int().positive(),
      name: z.string(),
      uploadedAt: z.string(),
      uploadedBy: z.number().int().nullable(),
      rows: z.array(
        z.object({
          "Equipment Name": cellSchema,
          Type: cellSchema,
          Flowrate: cellSchema,
          Pressure: cellSchema,
          Temperature: cellSchema
        })
      ),
      summary: z.object({
        total_count: z.number().int().nonnegative(),
        averages: statsSchema,
        minimums: statsSchema,
        maximums: statsSchema,
        std_deviations: statsSchema,
        type_distribution: distributionSchema,
        equipment_types: z.array(z.string())
      }),
      issues: z.array(
        z.object({
          row: z.number().int(),
          column: z.enum(["name", "category", "flowrate", "pressure", "temperature"]),
          code: z.enum(["EMPTY_NAME", "MISSING_VALUE", "NOT_NUMERIC", "NOT_FINITE"]),
          message: z.string()
        })
      ),
      droppedCount: z.number().int().nonnegative()
    })
  ),
  users: z.array(
    z.object({
      id: z.number().int().positive(),
      username: z.string(),
      email: z.string(),
      passwordHash: z.string(),
      createdAt: z.string()
    })
  ),
  tokens: z.array(z.object({ key: z.string(), userId: z.number().int(), createdAt: z.string() }))
});

export const loadStoreState = async (filePath: string): Promise<StoreState> => {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return emptyStoreState();
    }
    throw error;
  }
  const parsed = stateSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Store file ${filePath} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
};

/**
 * JSON-file store. Each commit writes a sibling temp file and renames it into
 * place; the memory store runs commits one at a time.
 */
export const createFileStore = async (filePath: string): Promise<AppStore> => {
  const initial = await loadStoreState(filePath);
  await mkdir(dirname(filePath), { recursive: true });

  const persist = async (state: StoreState): Promise<void> => {
    const tempPath = `${filePath}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(state), "utf8");
      await rename(tempPath, filePath);
    } catch (error) {
      console.error("[store] write failed", {
        filePath,
        message: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  };

  return createMemoryStore(initial, persist);
};

export const openStore = (dataFile: string): Promise<AppStore> =>
  dataFile === MEMORY_STORE ? Promise.resolve(createMemoryStore()) : createFileStore(dataFile);
