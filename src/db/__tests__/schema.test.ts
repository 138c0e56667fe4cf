import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDatabase, type Db } from "../connection.js";
import { ConstraintViolationError, translateDbError } from "../errors.js";
import { CORE_INDEXES, CORE_TABLES, initSchema, listSchemaObjects } from "../schema.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}

describe("schema", () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("creates the four tables and their indexes", () => {
    const objects = listSchemaObjects(db);
    for (const table of CORE_TABLES) {
      expect(objects.tables).toContain(table);
    }
    for (const index of CORE_INDEXES) {
      expect(objects.indexes).toContain(index);
    }
  });

  it("is idempotent", () => {
    const before = listSchemaObjects(db);
    expect(() => initSchema(db)).not.toThrow();
    expect(() => initSchema(db)).not.toThrow();
    expect(listSchemaObjects(db)).toEqual(before);
  });

  it("keeps rows when run again", () => {
    db.prepare("INSERT INTO clients(id, name) VALUES(?, ?)").run("c1", "Acme");
    initSchema(db);
    const row = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM clients").get();
    expect(row?.n).toBe(1);
  });

  it("rejects an asset whose client does not exist", () => {
    const err = captureError(() =>
      db.prepare("INSERT INTO assets(id, client_id, name) VALUES(?, ?, ?)").run("a1", "nope", "Pump")
    );
    const translated = translateDbError(err);
    expect(translated).toBeInstanceOf(ConstraintViolationError);
    expect(translated).toMatchObject({ kind: "foreign_key", code: "SQLITE_CONSTRAINT_FOREIGNKEY" });
  });

  it("rejects a work order whose asset does not exist", () => {
    db.prepare("INSERT INTO clients(id, name) VALUES(?, ?)").run("c1", "Acme");
    const err = captureError(() =>
      db
        .prepare("INSERT INTO work_orders(id, client_id, asset_id, title) VALUES(?, ?, ?, ?)")
        .run("w1", "c1", "missing-asset", "Fix pump")
    );
    expect(translateDbError(err)).toMatchObject({ kind: "foreign_key" });
  });

  it("accepts a work order without an asset", () => {
    db.prepare("INSERT INTO clients(id, name) VALUES(?, ?)").run("c1", "Acme");
    expect(() =>
      db.prepare("INSERT INTO work_orders(id, client_id, title) VALUES(?, ?, ?)").run("w1", "c1", "Visit")
    ).not.toThrow();
  });

  it("rejects a second user with the same email", () => {
    const insert = db.prepare("INSERT INTO users(id, name, email) VALUES(?, ?, ?)");
    insert.run("u1", "Ana", "ana@example.com");
    const err = captureError(() => insert.run("u2", "Other Ana", "ana@example.com"));
    expect(translateDbError(err)).toMatchObject({ kind: "unique", code: "SQLITE_CONSTRAINT_UNIQUE" });
  });

  it("rejects a duplicate primary key", () => {
    const insert = db.prepare("INSERT INTO clients(id, name) VALUES(?, ?)");
    insert.run("c1", "Acme");
    const err = captureError(() => insert.run("c1", "Other"));
    expect(translateDbError(err)).toMatchObject({ kind: "primary_key" });
  });

  it("fills defaults", () => {
    db.prepare("INSERT INTO users(id, name, email) VALUES(?, ?, ?)").run("u1", "Ana", "ana@example.com");
    db.prepare("INSERT INTO clients(id, name) VALUES(?, ?)").run("c1", "Acme");
    db.prepare("INSERT INTO assets(id, client_id, name) VALUES(?, ?, ?)").run("a1", "c1", "Pump");
    db.prepare("INSERT INTO work_orders(id, client_id, title) VALUES(?, ?, ?)").run("w1", "c1", "Visit");

    const user = db
      .prepare<[], { role: string; is_active: number; created_at: string }>(
        "SELECT role, is_active, created_at FROM users"
      )
      .get();
    expect(user?.role).toBe("user");
    expect(user?.is_active).toBe(1);
    expect(user?.created_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);

    const asset = db.prepare<[], { status: string }>("SELECT status FROM assets").get();
    expect(asset?.status).toBe("operating");

    const workOrder = db
      .prepare<[], { status: string; closed_at: string | null; opened_at: string }>(
        "SELECT status, closed_at, opened_at FROM work_orders"
      )
      .get();
    expect(workOrder?.status).toBe("open");
    expect(workOrder?.closed_at).toBeNull();
    expect(workOrder?.opened_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it("passes other errors through untranslated", () => {
    const err = new Error("disk I/O error");
    expect(translateDbError(err)).toBe(err);
  });
});
