import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, resolve, sep } from "node:path";

export type StorageErrorReason = "invalid_key" | "not_found";

export class StorageError extends Error {
  readonly reason: StorageErrorReason;

  constructor(reason: StorageErrorReason, message: string) {
    super(message);
    this.name = "StorageError";
    this.reason = reason;
  }
}

export interface StoredObject {
  key: string;
  size: number;
  sha256: string;
}

export interface ObjectStorage {
  put(key: string, content: Buffer | string): Promise<StoredObject>;
  get(key: string): Promise<Buffer>;
}

/** Keep a file name usable as one path segment. */
export function safeFileName(name: string): string {
  const cleaned = basename(name).replace(/[^\w.-]+/g, "_").replace(/^\.+/, "");
  return cleaned || "file";
}

/**
 * Object storage on the local filesystem. Keys are relative slash paths
 * and must stay inside `baseDir`.
 */
export function createLocalStorage(baseDir: string): ObjectStorage {
  const root = resolve(baseDir);

  function pathFor(key: string): string {
    if (!key || isAbsolute(key) || key.split(/[\\/]/).includes("..")) {
      throw new StorageError("invalid_key", `Invalid storage key: ${key}`);
    }
    const full = resolve(join(root, key));
    if (!full.startsWith(root + sep)) {
      throw new StorageError("invalid_key", `Invalid storage key: ${key}`);
    }
    return full;
  }

  return {
    async put(key, content) {
      const full = pathFor(key);
      const buffer = typeof content === "string" ? Buffer.from(content, "utf8") : content;
      await mkdir(dirname(full), { recursive: true });
      await writeFile(full, buffer);
      return {
        key,
        size: buffer.length,
        sha256: createHash("sha256").update(buffer).digest("hex"),
      };
    },
    async get(key) {
      const full = pathFor(key);
      try {
        return await readFile(full);
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          throw new StorageError("not_found", `Object not found: ${key}`);
        }
        throw err;
      }
    },
  };
}
