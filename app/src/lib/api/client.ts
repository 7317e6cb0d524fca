import type {
  ApiErrorBody,
  AuthResponse,
  DatasetListEntry,
  DatasetPayload,
  UploadResponse,
  UserProfile
} from "../../types/dataset";

const TOKEN_KEY = "equipment-visualizer-token";

export const API_BASE: string = import.meta.env.VITE_API_BASE ?? "";

export class ApiRequestError extends Error {
  status: number;
  details?: unknown;

  constructor(message: string, status: number, details?: unknown) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
    this.details = details;
  }
}

export const getStoredToken = (): string | null =>
  typeof window === "undefined" ? null : window.localStorage.getItem(TOKEN_KEY);

export const setStoredToken = (token: string | null) => {
  if (typeof window === "undefined") {
    return;
  }
  if (token) {
    window.localStorage.setItem(TOKEN_KEY, token);
  } else {
    window.localStorage.removeItem(TOKEN_KEY);
  }
};

const isErrorBody = (value: unknown): value is ApiErrorBody =>
  typeof value === "object" && value !== null && typeof Reflect.get(value, "error") === "string";

const readError = async (response: Response): Promise<ApiRequestError> => {
  const text = await response.text().catch(() => "");
  let message = text || `Request failed (${response.status})`;
  let details: unknown;
  try {
    const parsed: unknown = JSON.parse(text);
    if (isErrorBody(parsed)) {
      message = parsed.error;
      details = parsed.details;
    }
  } catch {
    // plain-text error body
  }
  return new ApiRequestError(message, response.status, details);
};

const request = async (path: string, init: RequestInit = {}): Promise<Response> => {
  const headers = new Headers(init.headers);
  const token = getStoredToken();
  if (token) {
    headers.set("Authorization", `Token ${token}`);
  }
  if (init.body !== undefined) {
    headers.set("Content-Type", "application/json");
  }
  const response = await fetch(`${API_BASE}${path}`, { ...init, headers });
  if (!response.ok) {
    throw await readError(response);
  }
  return response;
};

const requestJson = async <T>(path: string, init: RequestInit = {}): Promise<T> => {
  const response = await request(path, init);
  return response.json();
};

export const login = (username: string, password: string) =>
  requestJson<AuthResponse>("/api/auth/login/", {
    method: "POST",
    body: JSON.stringify({ username, password })
  });

export const register = (username: string, password: string, email: string) =>
  requestJson<AuthResponse>("/api/auth/register/", {
    method: "POST",
    body: JSON.stringify({ username, password, email })
  });

export const logout = () =>
  requestJson<{ message: string }>("/api/auth/logout/", { method: "POST" });

export const fetchProfile = () => requestJson<UserProfile>("/api/auth/profile/");

export const uploadCsv = (fileName: string, content: string, name?: string) =>
  requestJson<UploadResponse>("/api/upload/", {
    method: "POST",
    body: JSON.stringify({ fileName, content, name })
  });

export const fetchDataset = (id: number) => requestJson<DatasetPayload>(`/api/dataset/${id}/`);

export const fetchLatestDataset = async (): Promise<DatasetPayload | null> => {
  try {
    return await requestJson<DatasetPayload>("/api/dataset/latest/");
  } catch (error) {
    if (error instanceof ApiRequestError && error.status === 404) {
      return null;
    }
    throw error;
  }
};

export const fetchHistory = () => requestJson<DatasetListEntry[]>("/api/history/");

export const deleteDataset = async (id: number): Promise<void> => {
  await request(`/api/dataset/${id}/`, { method: "DELETE" });
};

export const downloadReport = async (id: number): Promise<Blob> => {
  const response = await request(`/api/pdf/${id}/`);
  return response.blob();
};
