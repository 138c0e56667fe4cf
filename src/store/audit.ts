import type { Db } from "../db/connection.js";

export interface AuditEntry {
  id: number;
  time: number;
  userId: string | null;
  action: string;
  resourceType: string | null;
  resourceId: string | null;
  metadata: Record<string, unknown> | null;
}

export type NewAuditEntry = Omit<AuditEntry, "id" | "time"> & { time?: number };

export interface AuditStore {
  insert(entry: NewAuditEntry): number;
  list(filter?: { action?: string; resourceId?: string; limit?: number }): AuditEntry[];
}

interface AuditRow {
  id: number;
  time: number;
  user_id: string | null;
  action: string;
  resource_type: string | null;
  resource_id: string | null;
  metadata_json: string | null;
}

export function createAuditStore(db: Db): AuditStore {
  return {
    insert(entry) {
      const result = db
        .prepare(
          "INSERT INTO audit_logs(time, user_id, action, resource_type, resource_id, metadata_json) VALUES(?,?,?,?,?,?)"
        )
        .run(
          entry.time ?? Date.now(),
          entry.userId,
          entry.action,
          entry.resourceType,
          entry.resourceId,
          entry.metadata ? JSON.stringify(entry.metadata) : null
        );
      return Number(result.lastInsertRowid);
    },
    list(filter = {}) {
      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (filter.action) {
        clauses.push("action=?");
        params.push(filter.action);
      }
      if (filter.resourceId) {
        clauses.push("resource_id=?");
        params.push(filter.resourceId);
      }
      const where = clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "";
      return db
        .prepare<Array<string | number>, AuditRow>(
          `SELECT id, time, user_id, action, resource_type, resource_id, metadata_json FROM audit_logs${where} ORDER BY id DESC LIMIT ?`
        )
        .all(...params, filter.limit ?? 100)
        .map(mapAuditRow);
    },
  };
}

function mapAuditRow(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    time: row.time,
    userId: row.user_id,
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    metadata: parseMetadata(row.metadata_json),
  };
}

function parseMetadata(json: string | null): Record<string, unknown> | null {
  if (!json) return null;
  const parsed: unknown = JSON.parse(json);
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return null;
}
