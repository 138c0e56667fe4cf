import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createBulkFixture, csv, type BulkFixture } from "./test-helpers.js";

const CLIENTS_CSV = csv([
  "Name,Document,Address,Active",
  "Acme Updated,123.456.789-01,Street 1,yes",
  "New Co,98765432000199,,no",
]);

describe("bulk service", () => {
  let fx: BulkFixture;

  beforeEach(() => {
    fx = createBulkFixture({ maxFileBytes: 1000, exportSyncLimit: 2 });
    fx.stores.clients.create({ id: "c1", name: "Acme", document: "12345678901" });
  });

  afterEach(async () => {
    await fx.queue.onIdle();
    fx.db.close();
  });

  describe("upload", () => {
    it("accepts only non-empty .csv files within the size limit", async () => {
      const base = { entity: "clients" as const, mode: "upsert" as const, userId: null };
      await expect(fx.service.upload({ ...base, fileName: "clients.xlsx", content: CLIENTS_CSV })).rejects.toMatchObject({
        status: 400,
        message: "Only .csv files are supported",
      });
      await expect(fx.service.upload({ ...base, fileName: "clients.csv", content: Buffer.alloc(0) })).rejects.toMatchObject({
        status: 400,
        message: "File is empty",
      });
      await expect(
        fx.service.upload({ ...base, fileName: "clients.csv", content: Buffer.alloc(1001, "a") })
      ).rejects.toMatchObject({ status: 413, code: "ERR_PAYLOAD_TOO_LARGE" });
    });

    it("stores the file and records the job", async () => {
      const job = await fx.service.upload({
        entity: "clients",
        mode: "upsert",
        fileName: "../My Clients.CSV",
        content: CLIENTS_CSV,
        userId: null,
      });
      expect(job.status).toBe("uploaded");
      expect(job.fileKey).toBe(`imports/clients/${job.id}/My_Clients.CSV`);
      expect(job.fileSize).toBe(CLIENTS_CSV.length);
      expect(job.templateVersion).toBe("v1");
      expect(fx.storage.objects.get(job.fileKey)).toEqual(CLIENTS_CSV);
      expect(fx.stores.audit.list({ action: "bulk.import.upload" })).toHaveLength(1);
    });
  });

  it("validates, confirms and applies an import", async () => {
    const uploaded = await fx.service.upload({
      entity: "clients",
      mode: "upsert",
      fileName: "clients.csv",
      content: CLIENTS_CSV,
      userId: null,
    });

    const { job, preview } = await fx.service.validate(uploaded.id);
    expect(job.status).toBe("ready_to_confirm");
    expect(job.errorReportKey).toBeNull();
    expect(preview).toEqual({
      created: 1,
      updated: 1,
      skipped: 0,
      errors: 0,
      samples: [
        { name: "Acme Updated", document: "12345678901", address: "Street 1", is_active: true },
        { name: "New Co", document: "98765432000199", is_active: false },
      ],
    });
    await expect(
      fx.service.upload({ entity: "clients", mode: "upsert", fileName: "again.csv", content: CLIENTS_CSV, userId: null })
    ).rejects.toMatchObject({ status: 409, message: "This file is already being processed" });

    expect(fx.service.confirm(uploaded.id, null).status).toBe("queued");
    await fx.queue.onIdle();

    const done = fx.service.getImportJob(uploaded.id);
    expect(done.status).toBe("completed");
    expect(done.startedAt).toBe(1_700_000_000_000);
    expect(done.summary).toEqual({ created: 1, updated: 1, skipped: 0, errorsCount: 0, warningsCount: 0 });

    expect(fx.stores.clients.get("c1")).toMatchObject({ name: "Acme Updated", address: "Street 1", isActive: true });
    expect(fx.stores.clients.getByDocument("98765432000199")).toMatchObject({ name: "New Co", isActive: false });
    expect(fx.stores.audit.list({ action: "bulk.import.completed" })).toHaveLength(1);

    await expect(
      fx.service.upload({ entity: "clients", mode: "upsert", fileName: "again.csv", content: CLIENTS_CSV, userId: null })
    ).rejects.toMatchObject({ status: 409, message: "This file was already processed" });
  });

  it("fails validation and writes an error report", async () => {
    const uploaded = await fx.service.upload({
      entity: "users",
      mode: "upsert",
      fileName: "users.csv",
      content: csv(["Name,Email,Role", "Ana,ana@example.com,admin", ",bad-email,chief"]),
      userId: null,
    });

    const { job } = await fx.service.validate(uploaded.id);
    expect(job.status).toBe("failed");
    expect(job.errorReportKey).toBe(`errors/users/${uploaded.id}.csv`);
    expect(fx.service.listRowErrors(uploaded.id).map((e) => `${e.rowNumber}:${e.field}`)).toEqual([
      "3:name",
      "3:email",
      "3:role",
    ]);

    const report = await fx.service.errorReport(uploaded.id);
    expect(report.fileName).toBe(`errors_users_${uploaded.id}.csv`);
    expect(report.content.split("\n")[1]).toBe(
      ",bad-email,chief,ERROR,email;name;role,Required field;Invalid email;Invalid role"
    );
    expect(fx.stores.audit.list({ action: "bulk.import.validate" })[0].metadata).toEqual({
      created: 1,
      updated: 0,
      skipped: 0,
      errors: 1,
    });

    expect(() => fx.service.confirm(uploaded.id, null)).toThrow(/only validated jobs can be confirmed/);
  });

  it("fails the job when a required column is missing", async () => {
    const uploaded = await fx.service.upload({
      entity: "users",
      mode: "upsert",
      fileName: "users.csv",
      content: csv(["Name,Role", "Ana,admin"]),
      userId: null,
    });

    await expect(fx.service.validate(uploaded.id)).rejects.toMatchObject({
      status: 400,
      code: "ERR_IMPORT_INVALID",
      message: "Missing column EMAIL",
    });
    const job = fx.service.getImportJob(uploaded.id);
    expect(job.status).toBe("failed");
    expect(job.summary?.error).toBe("Missing column EMAIL");
    await expect(fx.service.errorReport(uploaded.id)).rejects.toMatchObject({ status: 404 });
  });

  it("fails the job when the stored file cannot be read", async () => {
    const uploaded = await fx.service.upload({
      entity: "clients",
      mode: "upsert",
      fileName: "clients.csv",
      content: CLIENTS_CSV,
      userId: null,
    });
    fx.storage.objects.delete(uploaded.fileKey);

    await expect(fx.service.validate(uploaded.id)).rejects.toMatchObject({ name: "StorageError", reason: "not_found" });
    const job = fx.service.getImportJob(uploaded.id);
    expect(job.status).toBe("failed");
    expect(job.summary?.error).toBe(`Object not found: ${uploaded.fileKey}`);

    const again = await fx.service.upload({
      entity: "clients",
      mode: "upsert",
      fileName: "clients.csv",
      content: CLIENTS_CSV,
      userId: null,
    });
    expect((await fx.service.validate(again.id)).job.status).toBe("ready_to_confirm");
  });

  it("records constraint failures during apply as row errors and keeps going", async () => {
    const uploaded = await fx.service.upload({
      entity: "users",
      mode: "upsert",
      fileName: "users.csv",
      content: csv(["ID,Name,Email", "u-new,Bea,bea@example.com", "u-new,Cy,cy@example.com"]),
      userId: null,
    });
    const { preview } = await fx.service.validate(uploaded.id);
    expect(preview).toMatchObject({ created: 2, errors: 0 });

    fx.service.confirm(uploaded.id, null);
    await fx.queue.onIdle();

    const job = fx.service.getImportJob(uploaded.id);
    expect(job.status).toBe("completed");
    expect(job.summary).toEqual({ created: 1, updated: 0, skipped: 0, errorsCount: 1, warningsCount: 0 });
    expect(fx.stores.users.get("u-new")).toMatchObject({ name: "Bea", email: "bea@example.com" });
    expect(fx.stores.users.getByEmail("cy@example.com")).toBeNull();

    const errors = fx.service.listRowErrors(uploaded.id);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ rowNumber: 3, field: "primary_key", severity: "error" });
    expect(errors[0].message).toContain("users.id");
  });

  it("refuses a second import of an entity while one is running", async () => {
    const uploaded = await fx.service.upload({
      entity: "clients",
      mode: "upsert",
      fileName: "clients.csv",
      content: CLIENTS_CSV,
      userId: null,
    });
    await fx.service.validate(uploaded.id);
    const other = fx.jobs.createImportJob({
      entity: "clients",
      mode: "upsert",
      status: "running",
      fileKey: "imports/clients/other/file.csv",
      fileName: "file.csv",
      fileSize: 1,
      fileHash: "other",
      templateVersion: "v1",
      createdBy: null,
      createdAt: 1,
    });

    expect(() => fx.service.confirm(uploaded.id, null)).toThrow(`Another clients import is in progress (${other.id})`);
  });

  describe("export", () => {
    it("returns small exports inline", () => {
      const result = fx.service.exportEntity("clients", null);
      if (result.kind !== "inline") throw new Error("expected an inline export");
      expect(result.file).toEqual({
        fileName: "export_clients_20231114T221320Z.csv",
        content: "ID,Name,Document,Address,Active\nc1,Acme,12345678901,,yes\n",
        count: 1,
      });
      expect(fx.stores.audit.list({ action: "bulk.export" })).toHaveLength(1);
    });

    it("queues large exports as jobs", async () => {
      fx.stores.clients.create({ id: "c2", name: "Globex" });
      fx.stores.clients.create({ id: "c3", name: "Initech", isActive: false });

      const result = fx.service.exportEntity("clients", null);
      if (result.kind !== "job") throw new Error("expected an export job");
      await expect(fx.service.downloadExport(result.job.id)).rejects.toMatchObject({ status: 409 });

      await fx.queue.onIdle();
      const job = fx.service.getExportJob(result.job.id);
      expect(job.status).toBe("completed");
      expect(job.summary).toEqual({ exported: 3 });
      expect(job.fileKey).toBe(`exports/clients/${job.id}.csv`);

      const file = await fx.service.downloadExport(job.id);
      expect(file.fileName).toBe("export_clients_20231114T221320Z.csv");
      expect(file.content.split("\n")).toEqual([
        "ID,Name,Document,Address,Active",
        "c1,Acme,12345678901,,yes",
        "c2,Globex,,,yes",
        "c3,Initech,,,no",
        "",
      ]);
    });
  });

  it("describes every entity and its template", () => {
    expect(fx.service.listEntities().map((e) => e.entity)).toEqual(["clients", "assets", "users"]);
    expect(fx.service.template("users")).toEqual({
      fileName: "template_users_v1.csv",
      content: "ID,Name,Email,Role,Active\nOptional,Required,Required,Optional (admin/manager/technician/user),Optional (yes/no)\n",
    });
  });
});
