import { ulid } from "ulid";
import type { Db } from "../db/connection.js";
import { sqlTimestampToIso } from "../db/time.js";
import { insertRow, likePattern, normalizePage, toSqlBool, updateRow, Where, type Page } from "./sql.js";

export interface AssetRecord {
  id: string;
  clientId: string;
  name: string;
  type: string | null;
  location: string | null;
  status: string | null;
  isActive: boolean;
  createdAt: string;
}

export interface CreateAssetInput {
  id?: string;
  clientId: string;
  name: string;
  type?: string | null;
  location?: string | null;
  /** Omitted → database default "operating" */
  status?: string | null;
  isActive?: boolean;
}

export type UpdateAssetInput = Partial<Omit<CreateAssetInput, "id">>;

export interface AssetFilter extends Page {
  clientId?: string;
  status?: string;
  search?: string;
  includeInactive?: boolean;
}

export interface AssetStore {
  create(input: CreateAssetInput): AssetRecord;
  get(id: string): AssetRecord | null;
  findByClientAndName(clientId: string, name: string): AssetRecord | null;
  list(filter?: AssetFilter): AssetRecord[];
  listAll(): AssetRecord[];
  count(filter?: Omit<AssetFilter, keyof Page>): number;
  update(id: string, patch: UpdateAssetInput): AssetRecord | null;
  deactivate(id: string): boolean;
}

interface AssetRow {
  id: string;
  client_id: string;
  name: string;
  type: string | null;
  location: string | null;
  status: string | null;
  is_active: number;
  created_at: string;
}

const COLUMNS = "id, client_id, name, type, location, status, is_active, created_at";

export function createAssetStore(db: Db): AssetStore {
  function buildWhere(filter: Omit<AssetFilter, keyof Page>): Where {
    return new Where()
      .when(!filter.includeInactive, "is_active=1")
      .when(filter.clientId, "client_id=?", filter.clientId ?? null)
      .when(filter.status, "status=?", filter.status ?? null)
      .when(filter.search, "name LIKE ? ESCAPE '\\'", likePattern(filter.search ?? ""));
  }

  const store: AssetStore = {
    create(input) {
      const id = input.id ?? ulid();
      insertRow(db, "assets", {
        id,
        client_id: input.clientId,
        name: input.name.trim(),
        type: input.type,
        location: input.location,
        status: input.status,
        is_active: toSqlBool(input.isActive),
      });
      const created = store.get(id);
      if (!created) throw new Error(`Asset ${id} missing after insert`);
      return created;
    },
    get(id) {
      const row = db.prepare<[string], AssetRow>(`SELECT ${COLUMNS} FROM assets WHERE id=?`).get(id);
      return row ? mapAssetRow(row) : null;
    },
    findByClientAndName(clientId, name) {
      const row = db
        .prepare<[string, string], AssetRow>(
          `SELECT ${COLUMNS} FROM assets WHERE client_id=? AND name=? ORDER BY is_active DESC, created_at ASC LIMIT 1`
        )
        .get(clientId, name.trim());
      return row ? mapAssetRow(row) : null;
    },
    list(filter = {}) {
      const where = buildWhere(filter);
      const { limit, offset } = normalizePage(filter);
      return db
        .prepare<unknown[], AssetRow>(
          `SELECT ${COLUMNS} FROM assets${where.toSql()} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
        )
        .all(...where.params, limit, offset)
        .map(mapAssetRow);
    },
    listAll() {
      return db
        .prepare<[], AssetRow>(`SELECT ${COLUMNS} FROM assets ORDER BY created_at ASC, rowid ASC`)
        .all()
        .map(mapAssetRow);
    },
    count(filter = {}) {
      const where = buildWhere(filter);
      const row = db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM assets${where.toSql()}`)
        .get(...where.params);
      return row?.n ?? 0;
    },
    update(id, patch) {
      const found = updateRow(db, "assets", id, {
        client_id: patch.clientId,
        name: patch.name?.trim(),
        type: patch.type,
        location: patch.location,
        status: patch.status,
        is_active: toSqlBool(patch.isActive),
      });
      return found ? store.get(id) : null;
    },
    deactivate(id) {
      const result = db.prepare("UPDATE assets SET is_active=0 WHERE id=? AND is_active=1").run(id);
      return result.changes > 0;
    },
  };
  return store;
}

function mapAssetRow(row: AssetRow): AssetRecord {
  return {
    id: row.id,
    clientId: row.client_id,
    name: row.name,
    type: row.type,
    location: row.location,
    status: row.status,
    isActive: row.is_active === 1,
    createdAt: sqlTimestampToIso(row.created_at),
  };
}
