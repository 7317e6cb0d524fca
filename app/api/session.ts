import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import type { AppStore, UserRecord } from "./store";
import { getHeader, type ApiRequest } from "./utils/http";

const KEY_LENGTH = 64;

const deriveKey = (password: string, salt: string): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, derived) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derived);
    });
  });

// Stored as "scrypt$<salt>$<hash>", both hex.
export const hashPassword = async (password: string): Promise<string> => {
  const salt = randomBytes(16).toString("hex");
  const derived = await deriveKey(password, salt);
  return `scrypt$${salt}$${derived.toString("hex")}`;
};

export const verifyPassword = async (password: string, stored: string): Promise<boolean> => {
  const [scheme, salt, hash] = stored.split("$");
  if (scheme !== "scrypt" || !salt || !hash) {
    return false;
  }
  const expected = Buffer.from(hash, "hex");
  const derived = await deriveKey(password, salt);
  return expected.length === derived.length && timingSafeEqual(expected, derived);
};

export const createTokenKey = (): string => randomBytes(20).toString("hex");

export const readToken = (req: ApiRequest): string | null => {
  const header = getHeader(req, "authorization");
  if (!header) {
    return null;
  }
  const match = /^(?:Token|Bearer)\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : null;
};

export const resolveUser = async (req: ApiRequest, store: AppStore): Promise<UserRecord | null> => {
  const token = readToken(req);
  return token ? store.findUserByToken(token) : null;
};
