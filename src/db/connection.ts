import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { initSchema } from "./schema.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("db");

export type Db = Database.Database;

/**
 * Open the SQLite database and make sure the schema exists.
 * Errors (permissions, corrupt file, DDL failure) propagate to the caller.
 */
export function openDatabase(path: string): Db {
  if (path !== ":memory:") {
    // better-sqlite3 won't create the parent directory.
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);
  try {
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    initSchema(db);
  } catch (err) {
    db.close();
    throw err;
  }
  log.debug(`Database ready at ${path}`);
  return db;
}
