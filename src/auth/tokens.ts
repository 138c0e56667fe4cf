import { createHash, randomBytes } from "node:crypto";

export function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

/** 48 hex chars */
export function createToken(): string {
  return randomBytes(24).toString("hex");
}
