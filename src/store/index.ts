/**
 * Repository exports.
 */

import type { Db } from "../db/connection.js";
import { createAssetStore, type AssetStore } from "./assets.js";
import { createAuditStore, type AuditStore } from "./audit.js";
import { createClientStore, type ClientStore } from "./clients.js";
import { createRateLimitStore, type RateLimitStore } from "./rate-limits.js";
import { createSessionStore, type SessionStore } from "./sessions.js";
import { createUserStore, type UserStore } from "./users.js";
import { createWorkOrderStore, type WorkOrderStore } from "./work-orders.js";

export interface Stores {
  db: Db;
  users: UserStore;
  clients: ClientStore;
  assets: AssetStore;
  workOrders: WorkOrderStore;
  sessions: SessionStore;
  rateLimits: RateLimitStore;
  audit: AuditStore;
}

export function createStores(db: Db): Stores {
  return {
    db,
    users: createUserStore(db),
    clients: createClientStore(db),
    assets: createAssetStore(db),
    workOrders: createWorkOrderStore(db),
    sessions: createSessionStore(db),
    rateLimits: createRateLimitStore(db),
    audit: createAuditStore(db),
  };
}

export type { UserRecord, CreateUserInput, UpdateUserInput, UserStore } from "./users.js";
export type { ClientRecord, CreateClientInput, UpdateClientInput, ClientStore } from "./clients.js";
export type { AssetRecord, CreateAssetInput, UpdateAssetInput, AssetStore } from "./assets.js";
export type {
  WorkOrderRecord,
  CreateWorkOrderInput,
  UpdateWorkOrderInput,
  WorkOrderStore,
} from "./work-orders.js";
export type { AuditEntry, AuditStore } from "./audit.js";
