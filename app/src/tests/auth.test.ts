import { beforeEach, describe, expect, it, vi } from "vitest";
import { hashPassword, readToken, verifyPassword } from "../../api/session";
import type { AuthResponse, UploadResponse } from "../types/dataset";
import { createHarness } from "./apiHarness";
import { EQUIPMENT_CSV } from "./fixtures";

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return () => {
    vi.restoreAllMocks();
  };
});

const credentials = { username: "alice", password: "test-secret" };

describe("password hashing", () => {
  it("verifies the original password only", async () => {
    const stored = await hashPassword("test-secret");
    expect(stored.startsWith("scrypt$")).toBe(true);
    expect(await verifyPassword("test-secret", stored)).toBe(true);
    expect(await verifyPassword("wrong-secret", stored)).toBe(false);
    expect(await verifyPassword("test-secret", "plain-text")).toBe(false);
  });
});

describe("readToken", () => {
  it("accepts Token and Bearer schemes", () => {
    expect(readToken({ headers: { authorization: "Token abc123" } })).toBe("abc123");
    expect(readToken({ headers: { authorization: "Bearer abc123" } })).toBe("abc123");
    expect(readToken({ headers: { authorization: "Basic abc123" } })).toBeNull();
    expect(readToken({ headers: {} })).toBeNull();
  });
});

describe("auth routes", () => {
  it("registers a user and returns a token", async () => {
    const { call } = createHarness();
    const res = await call("POST", "/api/auth/register/", { body: credentials });

    expect(res.statusCode).toBe(201);
    const body = res.json<AuthResponse>();
    expect(body.message).toBe("User registered successfully");
    expect(body.user).toEqual({ id: 1, username: "alice", email: "" });
    expect(body.token).toMatch(/^[0-9a-f]{40}$/);
  });

  it("rejects duplicate usernames", async () => {
    const { call } = createHarness();
    await call("POST", "/api/auth/register/", { body: credentials });
    const res = await call("POST", "/api/auth/register/", { body: credentials });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'A user with username "alice" already exists.' });
  });

  it("validates registration fields", async () => {
    const { call } = createHarness();
    const res = await call("POST", "/api/auth/register/", {
      body: { username: "alice", password: "short", email: "not-an-email" }
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "Invalid registration details" });
  });

  it("logs in with the same token the user already holds", async () => {
    const { call } = createHarness();
    const registered = (await call("POST", "/api/auth/register/", { body: credentials })).json<AuthResponse>();
    const res = await call("POST", "/api/auth/login/", { body: credentials });

    expect(res.statusCode).toBe(200);
    const body = res.json<AuthResponse>();
    expect(body.message).toBe("Login successful");
    expect(body.token).toBe(registered.token);
  });

  it("rejects bad or missing credentials", async () => {
    const { call } = createHarness();
    await call("POST", "/api/auth/register/", { body: credentials });

    const wrong = await call("POST", "/api/auth/login/", {
      body: { username: "alice", password: "wrong-secret" }
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toMatchObject({ error: "Invalid credentials" });

    const missing = await call("POST", "/api/auth/login/", { body: { username: "alice" } });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toMatchObject({ error: "Please provide both username and password" });
  });

  it("returns the profile for a token and forgets it after logout", async () => {
    const { call } = createHarness();
    const { token } = (await call("POST", "/api/auth/register/", { body: credentials })).json<AuthResponse>();

    const profile = await call("GET", "/api/auth/profile/", { token });
    expect(profile.statusCode).toBe(200);
    expect(profile.json()).toEqual({ id: 1, username: "alice", email: "" });

    const logout = await call("POST", "/api/auth/logout/", { token });
    expect(logout.statusCode).toBe(200);
    expect(logout.json()).toEqual({ message: "Logout successful" });

    expect((await call("GET", "/api/auth/profile/", { token })).statusCode).toBe(401);
  });

  it("records the uploader of a dataset", async () => {
    const { call, upload } = createHarness({ requireAuth: true });
    const { token } = (await call("POST", "/api/auth/register/", { body: credentials })).json<AuthResponse>();

    const res = await upload("plant.csv", EQUIPMENT_CSV, token);
    expect(res.statusCode).toBe(201);
    expect(res.json<UploadResponse>().dataset.uploaded_by_name).toBe("alice");
  });
});
