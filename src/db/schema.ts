/**
 * Database schema.
 *
 * Every statement is `IF NOT EXISTS`, so `initSchema` runs on each startup.
 * Primary keys of the core tables are supplied by the application (no
 * autoincrement); rows are soft-deleted through `is_active`.
 */

import type Database from "better-sqlite3";

export const CORE_TABLES = ["users", "clients", "assets", "work_orders"] as const;

export const CORE_INDEXES = [
  "idx_users_email",
  "idx_clients_document",
  "idx_assets_client",
  "idx_work_orders_client",
  "idx_work_orders_status",
] as const;

const CORE_DDL = [
  `CREATE TABLE IF NOT EXISTS users (
    id VARCHAR PRIMARY KEY,
    name VARCHAR NOT NULL,
    email VARCHAR NOT NULL UNIQUE,
    role VARCHAR NOT NULL DEFAULT 'user',
    password VARCHAR NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS idx_users_email ON users(email)`,
  `CREATE TABLE IF NOT EXISTS clients (
    id VARCHAR PRIMARY KEY,
    name VARCHAR NOT NULL,
    document VARCHAR NULL,
    address TEXT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS idx_clients_document ON clients(document)`,
  `CREATE TABLE IF NOT EXISTS assets (
    id VARCHAR PRIMARY KEY,
    client_id VARCHAR NOT NULL REFERENCES clients(id),
    name VARCHAR NOT NULL,
    type VARCHAR NULL,
    location VARCHAR NULL,
    status VARCHAR NULL DEFAULT 'operating',
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS idx_assets_client ON assets(client_id)`,
  `CREATE TABLE IF NOT EXISTS work_orders (
    id VARCHAR PRIMARY KEY,
    client_id VARCHAR NOT NULL REFERENCES clients(id),
    asset_id VARCHAR NULL REFERENCES assets(id),
    title VARCHAR NOT NULL,
    description TEXT NULL,
    status VARCHAR NOT NULL DEFAULT 'open',
    opened_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    closed_at TIMESTAMP NULL,
    created_by VARCHAR NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE INDEX IF NOT EXISTS idx_work_orders_client ON work_orders(client_id)`,
  `CREATE INDEX IF NOT EXISTS idx_work_orders_status ON work_orders(status)`,
];

// Auth, audit and bulk bookkeeping. Times are epoch milliseconds.
const SUPPORT_DDL = [
  `CREATE TABLE IF NOT EXISTS sessions (
    token_hash TEXT PRIMARY KEY,
    user_id VARCHAR NOT NULL REFERENCES users(id),
    created_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL,
    revoked_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id)`,
  `CREATE TABLE IF NOT EXISTS rate_limits (
    bucket TEXT PRIMARY KEY,
    count INTEGER NOT NULL,
    reset_at INTEGER NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS audit_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    time INTEGER NOT NULL,
    user_id VARCHAR,
    action TEXT NOT NULL,
    resource_type TEXT,
    resource_id TEXT,
    metadata_json TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS import_jobs (
    id VARCHAR PRIMARY KEY,
    entity TEXT NOT NULL,
    mode TEXT NOT NULL,
    status TEXT NOT NULL,
    file_key TEXT NOT NULL,
    file_name TEXT NOT NULL,
    file_size INTEGER NOT NULL,
    file_hash TEXT NOT NULL,
    template_version TEXT NOT NULL,
    preview_json TEXT,
    summary_json TEXT,
    error_report_key TEXT,
    created_by VARCHAR,
    created_at INTEGER NOT NULL,
    started_at INTEGER,
    finished_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_import_jobs_hash ON import_jobs(entity, file_hash)`,
  `CREATE TABLE IF NOT EXISTS import_row_errors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    import_job_id VARCHAR NOT NULL REFERENCES import_jobs(id),
    row_number INTEGER NOT NULL,
    field TEXT NOT NULL,
    message TEXT NOT NULL,
    severity TEXT NOT NULL DEFAULT 'error'
  )`,
  `CREATE INDEX IF NOT EXISTS idx_import_row_errors_job ON import_row_errors(import_job_id, row_number)`,
  `CREATE TABLE IF NOT EXISTS export_jobs (
    id VARCHAR PRIMARY KEY,
    entity TEXT NOT NULL,
    status TEXT NOT NULL,
    file_key TEXT,
    file_name TEXT,
    file_size INTEGER,
    summary_json TEXT,
    created_by VARCHAR,
    created_at INTEGER NOT NULL,
    started_at INTEGER,
    finished_at INTEGER
  )`,
];

/**
 * Create every table and index that is missing. Runs in one transaction;
 * errors propagate so a failing schema aborts startup.
 */
export function initSchema(db: Database.Database): void {
  const apply = db.transaction(() => {
    for (const statement of [...CORE_DDL, ...SUPPORT_DDL]) {
      db.prepare(statement).run();
    }
  });
  apply();
}

export interface SchemaObjects {
  tables: string[];
  indexes: string[];
}

export function listSchemaObjects(db: Database.Database): SchemaObjects {
  const rows = db
    .prepare<[], { type: string; name: string }>(
      "SELECT type, name FROM sqlite_master WHERE type IN ('table','index') AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();
  return {
    tables: rows.filter((r) => r.type === "table").map((r) => r.name),
    indexes: rows.filter((r) => r.type === "index").map((r) => r.name),
  };
}
