import { ulid } from "ulid";
import type { Db } from "../db/connection.js";
import { nullableSqlTimestampToIso, sqlTimestampToIso, toSqlTimestamp } from "../db/time.js";
import { insertRow, likePattern, normalizePage, updateRow, Where, type Page } from "./sql.js";
import { FINAL_WORK_ORDER_STATUSES } from "./types.js";

export interface WorkOrderRecord {
  id: string;
  clientId: string;
  assetId: string | null;
  title: string;
  description: string | null;
  status: string;
  openedAt: string;
  closedAt: string | null;
  createdBy: string | null;
  isActive: boolean;
  createdAt: string;
}

export interface CreateWorkOrderInput {
  id?: string;
  clientId: string;
  assetId?: string | null;
  title: string;
  description?: string | null;
  /** Omitted → database default "open" */
  status?: string;
  createdBy?: string | null;
}

export interface UpdateWorkOrderInput {
  clientId?: string;
  assetId?: string | null;
  title?: string;
  description?: string | null;
  status?: string;
}

export interface WorkOrderFilter extends Page {
  clientId?: string;
  assetId?: string;
  status?: string;
  search?: string;
  includeInactive?: boolean;
}

export interface WorkOrderStore {
  create(input: CreateWorkOrderInput, now?: Date): WorkOrderRecord;
  get(id: string): WorkOrderRecord | null;
  list(filter?: WorkOrderFilter): WorkOrderRecord[];
  count(filter?: Omit<WorkOrderFilter, keyof Page>): number;
  /**
   * Moving into a final status stamps closed_at; moving back to an open
   * status clears it.
   */
  update(id: string, patch: UpdateWorkOrderInput, now?: Date): WorkOrderRecord | null;
  close(id: string, now?: Date): WorkOrderRecord | null;
  deactivate(id: string): boolean;
}

interface WorkOrderRow {
  id: string;
  client_id: string;
  asset_id: string | null;
  title: string;
  description: string | null;
  status: string;
  opened_at: string;
  closed_at: string | null;
  created_by: string | null;
  is_active: number;
  created_at: string;
}

const COLUMNS =
  "id, client_id, asset_id, title, description, status, opened_at, closed_at, created_by, is_active, created_at";

function isFinal(status: string): boolean {
  return FINAL_WORK_ORDER_STATUSES.includes(status);
}

export function createWorkOrderStore(db: Db): WorkOrderStore {
  function buildWhere(filter: Omit<WorkOrderFilter, keyof Page>): Where {
    return new Where()
      .when(!filter.includeInactive, "is_active=1")
      .when(filter.clientId, "client_id=?", filter.clientId ?? null)
      .when(filter.assetId, "asset_id=?", filter.assetId ?? null)
      .when(filter.status, "status=?", filter.status ?? null)
      .when(filter.search, "title LIKE ? ESCAPE '\\'", likePattern(filter.search ?? ""));
  }

  const store: WorkOrderStore = {
    create(input, now = new Date()) {
      const id = input.id ?? ulid();
      insertRow(db, "work_orders", {
        id,
        client_id: input.clientId,
        asset_id: input.assetId,
        title: input.title.trim(),
        description: input.description,
        status: input.status,
        closed_at: input.status !== undefined && isFinal(input.status) ? toSqlTimestamp(now) : undefined,
        created_by: input.createdBy,
      });
      const created = store.get(id);
      if (!created) throw new Error(`Work order ${id} missing after insert`);
      return created;
    },
    get(id) {
      const row = db
        .prepare<[string], WorkOrderRow>(`SELECT ${COLUMNS} FROM work_orders WHERE id=?`)
        .get(id);
      return row ? mapWorkOrderRow(row) : null;
    },
    list(filter = {}) {
      const where = buildWhere(filter);
      const { limit, offset } = normalizePage(filter);
      return db
        .prepare<unknown[], WorkOrderRow>(
          `SELECT ${COLUMNS} FROM work_orders${where.toSql()} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
        )
        .all(...where.params, limit, offset)
        .map(mapWorkOrderRow);
    },
    count(filter = {}) {
      const where = buildWhere(filter);
      const row = db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM work_orders${where.toSql()}`)
        .get(...where.params);
      return row?.n ?? 0;
    },
    update(id, patch, now = new Date()) {
      const current = store.get(id);
      if (!current) return null;

      let closedAt: string | null | undefined;
      if (patch.status !== undefined && patch.status !== current.status) {
        closedAt = isFinal(patch.status) ? toSqlTimestamp(now) : null;
      }

      updateRow(db, "work_orders", id, {
        client_id: patch.clientId,
        asset_id: patch.assetId,
        title: patch.title?.trim(),
        description: patch.description,
        status: patch.status,
        closed_at: closedAt,
      });
      return store.get(id);
    },
    close(id, now = new Date()) {
      return store.update(id, { status: "closed" }, now);
    },
    deactivate(id) {
      const result = db
        .prepare("UPDATE work_orders SET is_active=0 WHERE id=? AND is_active=1")
        .run(id);
      return result.changes > 0;
    },
  };
  return store;
}

function mapWorkOrderRow(row: WorkOrderRow): WorkOrderRecord {
  return {
    id: row.id,
    clientId: row.client_id,
    assetId: row.asset_id,
    title: row.title,
    description: row.description,
    status: row.status,
    openedAt: sqlTimestampToIso(row.opened_at),
    closedAt: nullableSqlTimestampToIso(row.closed_at),
    createdBy: row.created_by,
    isActive: row.is_active === 1,
    createdAt: sqlTimestampToIso(row.created_at),
  };
}
