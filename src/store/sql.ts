import type { Db } from "../db/connection.js";
import { withConstraints } from "../db/errors.js";

export type SqlValue = string | number | bigint | null;

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

export interface Page {
  limit?: number;
  offset?: number;
}

export function normalizePage(page: Page): { limit: number; offset: number } {
  const limit = Math.min(Math.max(page.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
  const offset = Math.max(page.offset ?? 0, 0);
  return { limit, offset };
}

export function toSqlBool(value: boolean | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value ? 1 : 0;
}

function definedEntries(values: Record<string, SqlValue | undefined>): Array<[string, SqlValue]> {
  return Object.entries(values).filter((entry): entry is [string, SqlValue] => entry[1] !== undefined);
}

/**
 * INSERT only the columns that were given so omitted ones fall back to
 * their DDL defaults.
 */
export function insertRow(
  db: Db,
  table: string,
  values: Record<string, SqlValue | undefined>
): void {
  const entries = definedEntries(values);
  const columns = entries.map(([column]) => column);
  const placeholders = columns.map(() => "?").join(", ");
  const sql = `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${placeholders})`;
  withConstraints(() => db.prepare(sql).run(...entries.map(([, value]) => value)));
}

/**
 * UPDATE the given columns of one row by id. Returns false when no row has
 * that id. An empty patch only checks that the row exists.
 */
export function updateRow(
  db: Db,
  table: string,
  id: string,
  values: Record<string, SqlValue | undefined>
): boolean {
  const entries = definedEntries(values);
  if (entries.length === 0) {
    const row = db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${table} WHERE id=?`).get(id);
    return row !== undefined;
  }
  const assignments = entries.map(([column]) => `${column}=?`).join(", ");
  const sql = `UPDATE ${table} SET ${assignments} WHERE id=?`;
  const result = withConstraints(() =>
    db.prepare(sql).run(...entries.map(([, value]) => value), id)
  );
  return result.changes > 0;
}

/** Accumulates AND-ed WHERE conditions with their parameters. */
export class Where {
  private readonly clauses: string[] = [];
  readonly params: SqlValue[] = [];

  add(clause: string, ...params: SqlValue[]): this {
    this.clauses.push(clause);
    this.params.push(...params);
    return this;
  }

  when(condition: unknown, clause: string, ...params: SqlValue[]): this {
    return condition ? this.add(clause, ...params) : this;
  }

  toSql(): string {
    return this.clauses.length > 0 ? ` WHERE ${this.clauses.join(" AND ")}` : "";
  }
}

export function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}
