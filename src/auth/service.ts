/**
 * Password login and bearer-token sessions.
 */

import type { AuthConfig } from "../config/schema.js";
import type { Stores } from "../store/index.js";
import type { UserRecord } from "../store/users.js";
import { createLogger } from "../utils/logger.js";
import { hashPassword, verifyPassword } from "./password.js";
import { createToken, hashToken } from "./tokens.js";

const log = createLogger("auth");

export interface AuthFailure {
  ok: false;
  status: number;
  code: "ERR_UNAUTHORIZED" | "ERR_FORBIDDEN" | "ERR_RATE_LIMIT";
  message: string;
  resetAt?: number;
}

export interface LoginSuccess {
  ok: true;
  token: string;
  tokenType: "bearer";
  expiresAt: number;
  user: UserRecord;
}

export interface AuthenticateSuccess {
  ok: true;
  user: UserRecord;
  tokenHash: string;
}

export type LoginResult = LoginSuccess | AuthFailure;
export type AuthenticateResult = AuthenticateSuccess | AuthFailure;

export interface AuthService {
  login(email: string, password: string, ip: string, now?: number): LoginResult;
  authenticate(authorizationHeader: string | undefined, now?: number): AuthenticateResult;
  logout(tokenHash: string, now?: number): void;
  /** Create the user as admin, or promote and reset the password of an existing one. */
  bootstrapOwner(input: { email: string; password: string; name: string }): UserRecord;
}

const INVALID_CREDENTIALS: AuthFailure = {
  ok: false,
  status: 401,
  code: "ERR_UNAUTHORIZED",
  message: "Invalid email or password",
};

export function createAuthService(stores: Stores, config: AuthConfig): AuthService {
  const { users, sessions, rateLimits } = stores;

  return {
    login(email, password, ip, now = Date.now()) {
      // Keep the session and rate-limit tables bounded
      sessions.cleanup(now);
      rateLimits.cleanup(now);

      const limit = rateLimits.check(
        `login:${ip}`,
        config.loginRateLimit.windowMs,
        config.loginRateLimit.max,
        now
      );
      if (!limit.allowed) {
        return {
          ok: false,
          status: 429,
          code: "ERR_RATE_LIMIT",
          message: "Too many login attempts",
          resetAt: limit.resetAt,
        };
      }

      const user = users.getByEmail(email);
      if (!user || !verifyPassword(password, user.passwordHash)) {
        log.info(`Failed login for ${email.trim().toLowerCase()} from ${ip}`);
        return INVALID_CREDENTIALS;
      }
      if (!user.isActive) {
        return { ok: false, status: 403, code: "ERR_FORBIDDEN", message: "User is inactive" };
      }

      const token = createToken();
      const expiresAt = now + config.tokenTtlMs;
      sessions.create({ tokenHash: hashToken(token), userId: user.id, createdAt: now, expiresAt });
      stores.audit.insert({
        time: now,
        userId: user.id,
        action: "auth.login",
        resourceType: "user",
        resourceId: user.id,
        metadata: { ip },
      });
      return { ok: true, token, tokenType: "bearer", expiresAt, user };
    },

    authenticate(authorizationHeader, now = Date.now()) {
      // Tolerate extra whitespace: "Bearer   <token>"
      const match = authorizationHeader?.match(/^Bearer\s+(\S+)\s*$/i);
      if (!match) {
        return { ok: false, status: 401, code: "ERR_UNAUTHORIZED", message: "Missing bearer token" };
      }
      const tokenHash = hashToken(match[1]);
      const session = sessions.get(tokenHash);
      if (!session || session.revokedAt !== null) {
        return { ok: false, status: 401, code: "ERR_UNAUTHORIZED", message: "Invalid token" };
      }
      if (session.expiresAt <= now) {
        return { ok: false, status: 401, code: "ERR_UNAUTHORIZED", message: "Token expired" };
      }
      const user = users.get(session.userId);
      if (!user || !user.isActive) {
        return { ok: false, status: 401, code: "ERR_UNAUTHORIZED", message: "User is inactive" };
      }
      return { ok: true, user, tokenHash };
    },

    logout(tokenHash, now = Date.now()) {
      sessions.revoke(tokenHash, now);
    },

    bootstrapOwner(input) {
      const passwordHash = hashPassword(input.password);
      const existing = users.getByEmail(input.email);
      if (existing) {
        users.update(existing.id, { role: "admin", isActive: true });
        users.setPassword(existing.id, passwordHash);
        log.info(`Promoted ${existing.email} to admin`);
        const updated = users.get(existing.id);
        if (!updated) throw new Error(`User ${existing.id} disappeared during bootstrap`);
        return updated;
      }
      const created = users.create({
        name: input.name,
        email: input.email,
        role: "admin",
        passwordHash,
      });
      log.info(`Created owner ${created.email}`);
      return created;
    },
  };
}
