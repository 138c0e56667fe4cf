import { ulid } from "ulid";
import type { Db } from "../db/connection.js";
import { sqlTimestampToIso } from "../db/time.js";
import { insertRow, likePattern, normalizePage, toSqlBool, updateRow, Where, type Page } from "./sql.js";

export interface ClientRecord {
  id: string;
  name: string;
  /** Tax id, digits only */
  document: string | null;
  address: string | null;
  isActive: boolean;
  createdAt: string;
}

export interface CreateClientInput {
  id?: string;
  name: string;
  document?: string | null;
  address?: string | null;
  isActive?: boolean;
}

export type UpdateClientInput = Partial<Omit<CreateClientInput, "id">>;

export interface ClientFilter extends Page {
  search?: string;
  document?: string;
  includeInactive?: boolean;
}

export interface ClientStore {
  create(input: CreateClientInput): ClientRecord;
  get(id: string): ClientRecord | null;
  getByDocument(document: string): ClientRecord | null;
  list(filter?: ClientFilter): ClientRecord[];
  listAll(): ClientRecord[];
  count(filter?: Omit<ClientFilter, keyof Page>): number;
  update(id: string, patch: UpdateClientInput): ClientRecord | null;
  deactivate(id: string): boolean;
}

interface ClientRow {
  id: string;
  name: string;
  document: string | null;
  address: string | null;
  is_active: number;
  created_at: string;
}

const COLUMNS = "id, name, document, address, is_active, created_at";

export function normalizeDocument(document: string): string {
  return document.replace(/\D/g, "");
}

export function createClientStore(db: Db): ClientStore {
  function buildWhere(filter: Omit<ClientFilter, keyof Page>): Where {
    return new Where()
      .when(!filter.includeInactive, "is_active=1")
      .when(filter.document, "document=?", normalizeDocument(filter.document ?? ""))
      .when(filter.search, "name LIKE ? ESCAPE '\\'", likePattern(filter.search ?? ""));
  }

  const store: ClientStore = {
    create(input) {
      const id = input.id ?? ulid();
      insertRow(db, "clients", {
        id,
        name: input.name.trim(),
        document: input.document ? normalizeDocument(input.document) : input.document,
        address: input.address,
        is_active: toSqlBool(input.isActive),
      });
      const created = store.get(id);
      if (!created) throw new Error(`Client ${id} missing after insert`);
      return created;
    },
    get(id) {
      const row = db.prepare<[string], ClientRow>(`SELECT ${COLUMNS} FROM clients WHERE id=?`).get(id);
      return row ? mapClientRow(row) : null;
    },
    getByDocument(document) {
      const row = db
        .prepare<[string], ClientRow>(
          `SELECT ${COLUMNS} FROM clients WHERE document=? ORDER BY is_active DESC, created_at ASC LIMIT 1`
        )
        .get(normalizeDocument(document));
      return row ? mapClientRow(row) : null;
    },
    list(filter = {}) {
      const where = buildWhere(filter);
      const { limit, offset } = normalizePage(filter);
      return db
        .prepare<unknown[], ClientRow>(
          `SELECT ${COLUMNS} FROM clients${where.toSql()} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
        )
        .all(...where.params, limit, offset)
        .map(mapClientRow);
    },
    listAll() {
      return db
        .prepare<[], ClientRow>(`SELECT ${COLUMNS} FROM clients ORDER BY created_at ASC, rowid ASC`)
        .all()
        .map(mapClientRow);
    },
    count(filter = {}) {
      const where = buildWhere(filter);
      const row = db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM clients${where.toSql()}`)
        .get(...where.params);
      return row?.n ?? 0;
    },
    update(id, patch) {
      const found = updateRow(db, "clients", id, {
        name: patch.name?.trim(),
        document: patch.document ? normalizeDocument(patch.document) : patch.document,
        address: patch.address,
        is_active: toSqlBool(patch.isActive),
      });
      return found ? store.get(id) : null;
    },
    deactivate(id) {
      const result = db.prepare("UPDATE clients SET is_active=0 WHERE id=? AND is_active=1").run(id);
      return result.changes > 0;
    },
  };
  return store;
}

function mapClientRow(row: ClientRow): ClientRecord {
  return {
    id: row.id,
    name: row.name,
    document: row.document,
    address: row.address,
    isActive: row.is_active === 1,
    createdAt: sqlTimestampToIso(row.created_at),
  };
}
