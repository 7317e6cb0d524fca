import { z } from "zod";
import type { AuthResponse } from "../src/types/dataset";
import type { ApiHandler } from "./context";
import { toUserProfile } from "./serialize";
import { createTokenKey, hashPassword, verifyPassword } from "./session";
import { DuplicateUserError, type UserRecord } from "./store";
import { ApiError, errorResponse, jsonResponse, readJsonBody } from "./utils/http";
import { logFailure, logStart, logSuccess } from "./utils/log";

const AUTH_BODY_LIMIT = 16 * 1024;

const registerSchema = z
  .object({
    username: z.string().trim().min(1).max(150).regex(/^[\w.@+-]+$/),
    password: z.string().min(8).max(128),
    email: z.union([z.string().trim().email(), z.literal("")]).optional().default("")
  })
  .strict();

const loginSchema = z.object({
  username: z.string().trim().optional(),
  password: z.string().optional()
});

export const registerHandler: ApiHandler = async (req, res, ctx) => {
  const { requestId, store } = ctx;
  const validated = registerSchema.safeParse(await readJsonBody(req, AUTH_BODY_LIMIT));
  if (!validated.success) {
    logFailure("register", requestId, validated.error, "Invalid request");
    errorResponse(res, requestId, 400, "Invalid registration details", validated.error.flatten().fieldErrors);
    return;
  }

  const { username, password, email } = validated.data;
  logStart("register", requestId, { username });
  let user: UserRecord;
  try {
    user = await store.createUser({ username, email, passwordHash: await hashPassword(password) });
  } catch (error) {
    if (error instanceof DuplicateUserError) {
      logFailure("register", requestId, error, "Duplicate username");
      errorResponse(res, requestId, 400, error.message);
      return;
    }
    throw error;
  }

  const token = await store.getOrCreateToken(user.id, createTokenKey);
  logSuccess("register", requestId, { userId: user.id });
  const payload: AuthResponse = {
    message: "User registered successfully",
    user: toUserProfile(user),
    token: token.key
  };
  jsonResponse(res, 201, payload);
};

export const loginHandler: ApiHandler = async (req, res, ctx) => {
  const { requestId, store } = ctx;
  const parsed = loginSchema.safeParse(await readJsonBody(req, AUTH_BODY_LIMIT));
  const username = parsed.success ? parsed.data.username : undefined;
  const password = parsed.success ? parsed.data.password : undefined;
  if (!username || !password) {
    errorResponse(res, requestId, 400, "Please provide both username and password");
    return;
  }

  logStart("login", requestId, { username });
  const user = await store.findUserByUsername(username);
  if (!user || !(await verifyPassword(password, user.passwordHash))) {
    logFailure("login", requestId, null, "Invalid credentials");
    errorResponse(res, requestId, 401, "Invalid credentials");
    return;
  }

  const token = await store.getOrCreateToken(user.id, createTokenKey);
  logSuccess("login", requestId, { userId: user.id });
  const payload: AuthResponse = {
    message: "Login successful",
    user: toUserProfile(user),
    token: token.key
  };
  jsonResponse(res, 200, payload);
};

const requireUser = (user: UserRecord | null): UserRecord => {
  if (!user) {
    throw new ApiError(401, "Authentication credentials were not provided.");
  }
  return user;
};

export const logoutHandler: ApiHandler = async (_req, res, ctx) => {
  const user = requireUser(ctx.user);
  await ctx.store.deleteToken(user.id);
  logSuccess("logout", ctx.requestId, { userId: user.id });
  jsonResponse(res, 200, { message: "Logout successful" });
};

export const profileHandler: ApiHandler = async (_req, res, ctx) => {
  jsonResponse(res, 200, toUserProfile(requireUser(ctx.user)));
};
