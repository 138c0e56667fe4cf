import { createHash } from "node:crypto";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createLocalStorage, safeFileName, StorageError, type ObjectStorage } from "../storage.js";

describe("safeFileName", () => {
  it("keeps one safe path segment", () => {
    expect(safeFileName("../../etc/passwd")).toBe("passwd");
    expect(safeFileName("My Clients (v2).csv")).toBe("My_Clients_v2_.csv");
    expect(safeFileName(".hidden.csv")).toBe("hidden.csv");
    expect(safeFileName("...")).toBe("file");
  });
});

describe("local storage", () => {
  let dir: string;
  let storage: ObjectStorage;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "opsdesk-storage-"));
    storage = createLocalStorage(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes and reads objects under nested keys", async () => {
    const stored = await storage.put("imports/clients/j1/file.csv", "a,b\n");
    expect(stored).toEqual({
      key: "imports/clients/j1/file.csv",
      size: 4,
      sha256: createHash("sha256").update("a,b\n").digest("hex"),
    });
    expect((await storage.get("imports/clients/j1/file.csv")).toString("utf8")).toBe("a,b\n");
  });

  it("reports missing objects", async () => {
    await expect(storage.get("exports/none.csv")).rejects.toMatchObject({ reason: "not_found" });
  });

  it("rejects keys that escape the base directory", async () => {
    await expect(storage.put("../outside.csv", "x")).rejects.toBeInstanceOf(StorageError);
    await expect(storage.get("/etc/passwd")).rejects.toMatchObject({ reason: "invalid_key" });
    await expect(storage.get("")).rejects.toMatchObject({ reason: "invalid_key" });
  });
});
