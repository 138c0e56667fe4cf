import { ulid } from "ulid";
import type { Db } from "../db/connection.js";
import { sqlTimestampToIso } from "../db/time.js";
import { insertRow, likePattern, normalizePage, toSqlBool, updateRow, Where, type Page } from "./sql.js";

export interface UserRecord {
  id: string;
  name: string;
  email: string;
  role: string;
  /** scrypt hash, never rendered by the API */
  passwordHash: string | null;
  isActive: boolean;
  createdAt: string;
}

export interface CreateUserInput {
  id?: string;
  name: string;
  email: string;
  role?: string;
  passwordHash?: string | null;
  isActive?: boolean;
}

export interface UpdateUserInput {
  name?: string;
  email?: string;
  role?: string;
  isActive?: boolean;
}

export interface UserFilter extends Page {
  role?: string;
  search?: string;
  includeInactive?: boolean;
}

export interface UserStore {
  create(input: CreateUserInput): UserRecord;
  get(id: string): UserRecord | null;
  getByEmail(email: string): UserRecord | null;
  list(filter?: UserFilter): UserRecord[];
  listAll(): UserRecord[];
  count(filter?: Omit<UserFilter, keyof Page>): number;
  update(id: string, patch: UpdateUserInput): UserRecord | null;
  setPassword(id: string, passwordHash: string): boolean;
  deactivate(id: string): boolean;
}

interface UserRow {
  id: string;
  name: string;
  email: string;
  role: string;
  password: string | null;
  is_active: number;
  created_at: string;
}

const COLUMNS = "id, name, email, role, password, is_active, created_at";

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function createUserStore(db: Db): UserStore {
  function buildWhere(filter: Omit<UserFilter, keyof Page>): Where {
    return new Where()
      .when(!filter.includeInactive, "is_active=1")
      .when(filter.role, "role=?", filter.role ?? null)
      .when(
        filter.search,
        "(name LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\')",
        likePattern(filter.search ?? ""),
        likePattern(filter.search ?? "")
      );
  }

  const store: UserStore = {
    create(input) {
      const id = input.id ?? ulid();
      insertRow(db, "users", {
        id,
        name: input.name.trim(),
        email: normalizeEmail(input.email),
        role: input.role,
        password: input.passwordHash,
        is_active: toSqlBool(input.isActive),
      });
      const created = store.get(id);
      if (!created) throw new Error(`User ${id} missing after insert`);
      return created;
    },
    get(id) {
      const row = db.prepare<[string], UserRow>(`SELECT ${COLUMNS} FROM users WHERE id=?`).get(id);
      return row ? mapUserRow(row) : null;
    },
    getByEmail(email) {
      const row = db
        .prepare<[string], UserRow>(`SELECT ${COLUMNS} FROM users WHERE email=?`)
        .get(normalizeEmail(email));
      return row ? mapUserRow(row) : null;
    },
    list(filter = {}) {
      const where = buildWhere(filter);
      const { limit, offset } = normalizePage(filter);
      return db
        .prepare<unknown[], UserRow>(
          `SELECT ${COLUMNS} FROM users${where.toSql()} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
        )
        .all(...where.params, limit, offset)
        .map(mapUserRow);
    },
    listAll() {
      return db
        .prepare<[], UserRow>(`SELECT ${COLUMNS} FROM users ORDER BY created_at ASC, rowid ASC`)
        .all()
        .map(mapUserRow);
    },
    count(filter = {}) {
      const where = buildWhere(filter);
      const row = db
        .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM users${where.toSql()}`)
        .get(...where.params);
      return row?.n ?? 0;
    },
    update(id, patch) {
      const found = updateRow(db, "users", id, {
        name: patch.name?.trim(),
        email: patch.email === undefined ? undefined : normalizeEmail(patch.email),
        role: patch.role,
        is_active: toSqlBool(patch.isActive),
      });
      return found ? store.get(id) : null;
    },
    setPassword(id, passwordHash) {
      return updateRow(db, "users", id, { password: passwordHash });
    },
    deactivate(id) {
      const result = db.prepare("UPDATE users SET is_active=0 WHERE id=? AND is_active=1").run(id);
      return result.changes > 0;
    },
  };
  return store;
}

function mapUserRow(row: UserRow): UserRecord {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    role: row.role,
    passwordHash: row.password,
    isActive: row.is_active === 1,
    createdAt: sqlTimestampToIso(row.created_at),
  };
}
