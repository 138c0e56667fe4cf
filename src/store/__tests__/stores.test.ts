import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDatabase, type Db } from "../../db/connection.js";
import { ConstraintViolationError } from "../../db/errors.js";
import { createStores, type Stores } from "../index.js";

describe("stores", () => {
  let db: Db;
  let stores: Stores;

  beforeEach(() => {
    db = openDatabase(":memory:");
    stores = createStores(db);
  });

  afterEach(() => {
    db.close();
  });

  describe("users", () => {
    it("normalizes email and applies defaults", () => {
      const user = stores.users.create({ name: " Ana ", email: "  Ana@Example.COM " });
      expect(user.name).toBe("Ana");
      expect(user.email).toBe("ana@example.com");
      expect(user.role).toBe("user");
      expect(user.isActive).toBe(true);
      expect(user.passwordHash).toBeNull();
      expect(user.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
      expect(stores.users.getByEmail("ANA@example.com")?.id).toBe(user.id);
    });

    it("rejects a duplicate email regardless of case", () => {
      stores.users.create({ id: "u1", name: "Ana", email: "ana@example.com" });
      expect(() => stores.users.create({ id: "u2", name: "Ana 2", email: "ANA@example.com" })).toThrow(
        ConstraintViolationError
      );
    });

    it("filters by role and search", () => {
      stores.users.create({ id: "u1", name: "Ana", email: "ana@example.com", role: "admin" });
      stores.users.create({ id: "u2", name: "Bruno", email: "bruno@example.com", role: "technician" });
      stores.users.create({ id: "u3", name: "Carla", email: "carla@example.com", role: "technician" });

      expect(stores.users.list({ role: "technician" }).map((u) => u.id)).toEqual(["u3", "u2"]);
      expect(stores.users.list({ search: "bru" }).map((u) => u.id)).toEqual(["u2"]);
      expect(stores.users.count()).toBe(3);
    });

    it("updates only the given fields", () => {
      stores.users.create({ id: "u1", name: "Ana", email: "ana@example.com" });
      const updated = stores.users.update("u1", { role: "manager" });
      expect(updated?.role).toBe("manager");
      expect(updated?.name).toBe("Ana");
      expect(stores.users.update("missing", { role: "manager" })).toBeNull();
    });

    it("stores a password hash", () => {
      stores.users.create({ id: "u1", name: "Ana", email: "ana@example.com" });
      expect(stores.users.setPassword("u1", "scrypt$00$11")).toBe(true);
      expect(stores.users.get("u1")?.passwordHash).toBe("scrypt$00$11");
    });
  });

  describe("clients", () => {
    it("keeps only the digits of the document", () => {
      const client = stores.clients.create({ id: "c1", name: "Acme", document: "123.456.789-01" });
      expect(client.document).toBe("12345678901");
      expect(stores.clients.getByDocument("123.456.789-01")?.id).toBe("c1");
    });

    it("escapes LIKE wildcards in search", () => {
      stores.clients.create({ id: "c1", name: "100% Parts" });
      stores.clients.create({ id: "c2", name: "Acme" });
      expect(stores.clients.list({ search: "%" }).map((c) => c.id)).toEqual(["c1"]);
      expect(stores.clients.list({ search: "acm" }).map((c) => c.id)).toEqual(["c2"]);
    });

    it("soft-deletes", () => {
      stores.clients.create({ id: "c1", name: "Acme" });
      stores.clients.create({ id: "c2", name: "Globex" });

      expect(stores.clients.deactivate("c1")).toBe(true);
      expect(stores.clients.deactivate("c1")).toBe(false);

      expect(stores.clients.list().map((c) => c.id)).toEqual(["c2"]);
      expect(stores.clients.list({ includeInactive: true }).map((c) => c.id)).toEqual(["c2", "c1"]);
      expect(stores.clients.get("c1")?.isActive).toBe(false);
      expect(stores.clients.count()).toBe(1);
      expect(stores.clients.count({ includeInactive: true })).toBe(2);
    });

    it("pages results", () => {
      for (let i = 1; i <= 5; i += 1) {
        stores.clients.create({ id: `c${i}`, name: `Client ${i}` });
      }
      expect(stores.clients.list({ limit: 2 }).map((c) => c.id)).toEqual(["c5", "c4"]);
      expect(stores.clients.list({ limit: 2, offset: 2 }).map((c) => c.id)).toEqual(["c3", "c2"]);
    });

    it("returns the record on an empty patch and null for unknown ids", () => {
      stores.clients.create({ id: "c1", name: "Acme" });
      expect(stores.clients.update("c1", {})?.name).toBe("Acme");
      expect(stores.clients.update("nope", {})).toBeNull();
    });
  });

  describe("assets", () => {
    beforeEach(() => {
      stores.clients.create({ id: "c1", name: "Acme" });
      stores.clients.create({ id: "c2", name: "Globex" });
    });

    it("defaults status to operating", () => {
      const asset = stores.assets.create({ id: "a1", clientId: "c1", name: "Pump" });
      expect(asset.status).toBe("operating");
      expect(asset.clientId).toBe("c1");
    });

    it("rejects an unknown client", () => {
      let caught: unknown;
      try {
        stores.assets.create({ clientId: "missing", name: "Pump" });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ConstraintViolationError);
      expect(caught).toMatchObject({ kind: "foreign_key" });
    });

    it("filters by client and status", () => {
      stores.assets.create({ id: "a1", clientId: "c1", name: "Pump" });
      stores.assets.create({ id: "a2", clientId: "c1", name: "Boiler", status: "maintenance" });
      stores.assets.create({ id: "a3", clientId: "c2", name: "Pump" });

      expect(stores.assets.list({ clientId: "c1" }).map((a) => a.id)).toEqual(["a2", "a1"]);
      expect(stores.assets.list({ status: "maintenance" }).map((a) => a.id)).toEqual(["a2"]);
      expect(stores.assets.findByClientAndName("c2", "Pump")?.id).toBe("a3");
      expect(stores.assets.findByClientAndName("c2", "Boiler")).toBeNull();
    });
  });

  describe("work orders", () => {
    const now = new Date("2026-03-04T05:06:07.890Z");

    beforeEach(() => {
      stores.clients.create({ id: "c1", name: "Acme" });
      stores.assets.create({ id: "a1", clientId: "c1", name: "Pump" });
    });

    it("defaults status to open with no close time", () => {
      const wo = stores.workOrders.create({ id: "w1", clientId: "c1", assetId: "a1", title: "Fix pump" });
      expect(wo.status).toBe("open");
      expect(wo.closedAt).toBeNull();
      expect(wo.assetId).toBe("a1");
      expect(wo.openedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.000Z$/);
    });

    it("rejects an unknown asset", () => {
      expect(() =>
        stores.workOrders.create({ clientId: "c1", assetId: "missing", title: "Fix pump" })
      ).toThrow(ConstraintViolationError);
    });

    it("stamps closed_at when closed and clears it when reopened", () => {
      stores.workOrders.create({ id: "w1", clientId: "c1", title: "Fix pump" });

      const closed = stores.workOrders.close("w1", now);
      expect(closed?.status).toBe("closed");
      expect(closed?.closedAt).toBe("2026-03-04T05:06:07.000Z");

      const reopened = stores.workOrders.update("w1", { status: "in_progress" }, now);
      expect(reopened?.status).toBe("in_progress");
      expect(reopened?.closedAt).toBeNull();
    });

    it("keeps closed_at when the status does not change", () => {
      stores.workOrders.create({ id: "w1", clientId: "c1", title: "Fix pump", status: "cancelled" }, now);
      const later = new Date("2026-03-05T00:00:00.000Z");
      const updated = stores.workOrders.update("w1", { status: "cancelled", title: "Fix pump now" }, later);
      expect(updated?.closedAt).toBe("2026-03-04T05:06:07.000Z");
      expect(updated?.title).toBe("Fix pump now");
    });

    it("filters by status and asset", () => {
      stores.workOrders.create({ id: "w1", clientId: "c1", assetId: "a1", title: "Fix pump" });
      stores.workOrders.create({ id: "w2", clientId: "c1", title: "Visit", status: "on_hold" });
      expect(stores.workOrders.list({ assetId: "a1" }).map((w) => w.id)).toEqual(["w1"]);
      expect(stores.workOrders.list({ status: "on_hold" }).map((w) => w.id)).toEqual(["w2"]);
      expect(stores.workOrders.count({ clientId: "c1" })).toBe(2);
    });
  });

  describe("sessions and rate limits", () => {
    it("revokes sessions", () => {
      stores.users.create({ id: "u1", name: "Ana", email: "ana@example.com" });
      stores.sessions.create({ tokenHash: "h1", userId: "u1", createdAt: 1000, expiresAt: 5000 });
      stores.sessions.create({ tokenHash: "h2", userId: "u1", createdAt: 1000, expiresAt: 5000 });

      expect(stores.sessions.revoke("h1", 2000)).toBe(true);
      expect(stores.sessions.get("h1")?.revokedAt).toBe(2000);
      expect(stores.sessions.revokeAllForUser("u1", 3000)).toBe(1);

      stores.sessions.cleanup(5000);
      expect(stores.sessions.get("h2")).toBeNull();
    });

    it("counts hits in a fixed window", () => {
      expect(stores.rateLimits.check("login:1.2.3.4", 1000, 2, 0)).toEqual({ allowed: true, resetAt: 1000 });
      expect(stores.rateLimits.check("login:1.2.3.4", 1000, 2, 10).allowed).toBe(true);
      expect(stores.rateLimits.check("login:1.2.3.4", 1000, 2, 20)).toEqual({ allowed: false, resetAt: 1000 });
      expect(stores.rateLimits.check("login:1.2.3.4", 1000, 2, 1000)).toEqual({ allowed: true, resetAt: 2000 });
    });
  });

  describe("audit", () => {
    it("lists newest first with metadata", () => {
      stores.audit.insert({ time: 1, userId: null, action: "a", resourceType: null, resourceId: "r1", metadata: { n: 1 } });
      stores.audit.insert({ time: 2, userId: "u1", action: "b", resourceType: "user", resourceId: "r2", metadata: null });

      const all = stores.audit.list();
      expect(all.map((e) => e.action)).toEqual(["b", "a"]);
      expect(all[1].metadata).toEqual({ n: 1 });
      expect(stores.audit.list({ resourceId: "r2" })).toHaveLength(1);
    });
  });
});
