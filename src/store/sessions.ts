import type { Db } from "../db/connection.js";
import { withConstraints } from "../db/errors.js";

export interface SessionRecord {
  tokenHash: string;
  userId: string;
  createdAt: number;
  expiresAt: number;
  revokedAt: number | null;
}

export interface SessionStore {
  create(session: Omit<SessionRecord, "revokedAt">): void;
  get(tokenHash: string): SessionRecord | null;
  revoke(tokenHash: string, now: number): boolean;
  revokeAllForUser(userId: string, now: number): number;
  cleanup(now: number): void;
}

interface SessionRow {
  token_hash: string;
  user_id: string;
  created_at: number;
  expires_at: number;
  revoked_at: number | null;
}

export function createSessionStore(db: Db): SessionStore {
  return {
    create(session) {
      withConstraints(() =>
        db
          .prepare(
            "INSERT INTO sessions(token_hash, user_id, created_at, expires_at) VALUES(?,?,?,?)"
          )
          .run(session.tokenHash, session.userId, session.createdAt, session.expiresAt)
      );
    },
    get(tokenHash) {
      const row = db
        .prepare<[string], SessionRow>(
          "SELECT token_hash, user_id, created_at, expires_at, revoked_at FROM sessions WHERE token_hash=?"
        )
        .get(tokenHash);
      if (!row) return null;
      return {
        tokenHash: row.token_hash,
        userId: row.user_id,
        createdAt: row.created_at,
        expiresAt: row.expires_at,
        revokedAt: row.revoked_at,
      };
    },
    revoke(tokenHash, now) {
      const result = db
        .prepare("UPDATE sessions SET revoked_at=? WHERE token_hash=? AND revoked_at IS NULL")
        .run(now, tokenHash);
      return result.changes > 0;
    },
    revokeAllForUser(userId, now) {
      const result = db
        .prepare("UPDATE sessions SET revoked_at=? WHERE user_id=? AND revoked_at IS NULL")
        .run(now, userId);
      return result.changes;
    },
    cleanup(now) {
      db.prepare("DELETE FROM sessions WHERE expires_at <= ?").run(now);
    },
  };
}
