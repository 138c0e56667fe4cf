/**
 * Wires the database, repositories, auth and bulk services for one process.
 */

import { createAuthService, type AuthService } from "./auth/service.js";
import { createJobStore, type JobStore } from "./bulk/job-store.js";
import { createTaskQueue, type TaskQueue } from "./bulk/queue.js";
import { createBulkService, type BulkService } from "./bulk/service.js";
import { createLocalStorage, type ObjectStorage } from "./bulk/storage.js";
import type { Config } from "./config/schema.js";
import { openDatabase, type Db } from "./db/connection.js";
import { createStores, type Stores } from "./store/index.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("app");

export interface App {
  config: Config;
  stores: Stores;
  jobs: JobStore;
  storage: ObjectStorage;
  queue: TaskQueue;
  auth: AuthService;
  bulk: BulkService;
  now: () => number;
  /** Wait for queued bulk jobs, then close the database. */
  close(): Promise<void>;
}

export interface CreateAppOptions {
  /** Use an already-open database instead of `config.database.sqlitePath` */
  db?: Db;
  storage?: ObjectStorage;
  now?: () => number;
}

export function createApp(config: Config, opts: CreateAppOptions = {}): App {
  const db = opts.db ?? openDatabase(config.database.sqlitePath);
  const now = opts.now ?? Date.now;
  const stores = createStores(db);
  const jobs = createJobStore(db);
  const storage = opts.storage ?? createLocalStorage(config.bulk.storageDir);
  const queue = createTaskQueue();
  const auth = createAuthService(stores, config.auth);
  const bulk = createBulkService({ stores, jobs, storage, queue, config: config.bulk, now });

  if (config.auth.bootstrapOwner) {
    auth.bootstrapOwner(config.auth.bootstrapOwner);
  }

  let closed = false;
  return {
    config,
    stores,
    jobs,
    storage,
    queue,
    auth,
    bulk,
    now,
    async close() {
      if (closed) return;
      closed = true;
      if (queue.size > 0) {
        log.info(`Waiting for ${queue.size} bulk task(s) to finish`);
      }
      await queue.onIdle();
      db.close();
    },
  };
}
