import type { Db } from "../db/connection.js";

export interface RateLimitResult {
  allowed: boolean;
  resetAt: number;
}

export interface RateLimitStore {
  /** Fixed-window counter: allows `max` hits per bucket every `windowMs`. */
  check(bucket: string, windowMs: number, max: number, now: number): RateLimitResult;
  cleanup(now: number): void;
}

interface RateLimitRow {
  count: number;
  reset_at: number;
}

export function createRateLimitStore(db: Db): RateLimitStore {
  return {
    check(bucket, windowMs, max, now) {
      const current = db
        .prepare<[string], RateLimitRow>("SELECT count, reset_at FROM rate_limits WHERE bucket=?")
        .get(bucket);
      if (!current || current.reset_at <= now) {
        db.prepare(
          "INSERT OR REPLACE INTO rate_limits(bucket, count, reset_at) VALUES(?,?,?)"
        ).run(bucket, 1, now + windowMs);
        return { allowed: true, resetAt: now + windowMs };
      }
      if (current.count >= max) {
        return { allowed: false, resetAt: current.reset_at };
      }
      db.prepare("UPDATE rate_limits SET count=count+1 WHERE bucket=?").run(bucket);
      return { allowed: true, resetAt: current.reset_at };
    },
    cleanup(now) {
      db.prepare("DELETE FROM rate_limits WHERE reset_at <= ?").run(now);
    },
  };
}
