/**
 * Entity-specific rules for bulk import: extra validation, lookup of the
 * existing record a row refers to, and the write itself.
 */

import type { Stores } from "../store/index.js";
import { isAssetStatus, isUserRole } from "../store/types.js";
import type { BulkEntity, RowData } from "./entities.js";

export interface FieldError {
  field: string;
  message: string;
}

export interface EntityHandler {
  validate(data: RowData, stores: Stores): FieldError[];
  /** Id of the record the row updates, or null for a new one */
  findExisting(data: RowData, stores: Stores): string | null;
  apply(data: RowData, existingId: string | null, stores: Stores): void;
}

const EMAIL_RE = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const DOCUMENT_RE = /^(\d{11}|\d{14})$/;

function text(data: RowData, key: string): string | undefined {
  const value = data[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function flag(data: RowData, key: string): boolean | undefined {
  const value = data[key];
  return typeof value === "boolean" ? value : undefined;
}

/** Name is a required column, so rows reaching apply() always carry it. */
function requiredText(data: RowData, key: string): string {
  const value = text(data, key);
  if (value === undefined) throw new Error(`Missing required value: ${key}`);
  return value;
}

export function isValidEmail(value: string): boolean {
  return EMAIL_RE.test(value);
}

export function isValidDocument(value: string): boolean {
  return DOCUMENT_RE.test(value);
}

const clientsHandler: EntityHandler = {
  validate(data) {
    const errors: FieldError[] = [];
    const document = data.document;
    if (typeof document === "string" && !isValidDocument(document)) {
      errors.push({ field: "document", message: "Invalid document" });
    }
    return errors;
  },
  findExisting(data, stores) {
    const id = text(data, "id");
    if (id) return stores.clients.get(id)?.id ?? null;
    const document = text(data, "document");
    if (document) return stores.clients.getByDocument(document)?.id ?? null;
    return null;
  },
  apply(data, existingId, stores) {
    const fields = {
      name: requiredText(data, "name"),
      document: text(data, "document"),
      address: text(data, "address"),
      isActive: flag(data, "is_active"),
    };
    if (existingId) {
      stores.clients.update(existingId, fields);
    } else {
      stores.clients.create({ id: text(data, "id"), ...fields });
    }
  },
};

function resolveAssetClientId(data: RowData, stores: Stores): string | null {
  const clientId = text(data, "client_id");
  if (clientId) return stores.clients.get(clientId)?.id ?? null;
  const document = text(data, "client_document");
  if (document) return stores.clients.getByDocument(document)?.id ?? null;
  return null;
}

const assetsHandler: EntityHandler = {
  validate(data, stores) {
    const errors: FieldError[] = [];
    const hasClientId = text(data, "client_id") !== undefined;
    const hasClientDocument = text(data, "client_document") !== undefined;
    if (!hasClientId && !hasClientDocument) {
      errors.push({ field: "client_id", message: "Provide Client ID or Client document" });
    } else if (!resolveAssetClientId(data, stores)) {
      errors.push({
        field: hasClientId ? "client_id" : "client_document",
        message: "Client not found",
      });
    }
    const status = text(data, "status");
    if (status && !isAssetStatus(status)) {
      errors.push({ field: "status", message: "Invalid status" });
    }
    return errors;
  },
  findExisting(data, stores) {
    const id = text(data, "id");
    if (id) return stores.assets.get(id)?.id ?? null;
    const clientId = resolveAssetClientId(data, stores);
    const name = text(data, "name");
    if (clientId && name) return stores.assets.findByClientAndName(clientId, name)?.id ?? null;
    return null;
  },
  apply(data, existingId, stores) {
    const clientId = resolveAssetClientId(data, stores);
    if (!clientId) throw new Error("Client not found");
    const fields = {
      clientId,
      name: requiredText(data, "name"),
      type: text(data, "type"),
      location: text(data, "location"),
      status: text(data, "status"),
      isActive: flag(data, "is_active"),
    };
    if (existingId) {
      stores.assets.update(existingId, fields);
    } else {
      stores.assets.create({ id: text(data, "id"), ...fields });
    }
  },
};

const usersHandler: EntityHandler = {
  validate(data) {
    const errors: FieldError[] = [];
    const email = text(data, "email");
    if (email && !isValidEmail(email)) {
      errors.push({ field: "email", message: "Invalid email" });
    }
    const role = text(data, "role");
    if (role && !isUserRole(role)) {
      errors.push({ field: "role", message: "Invalid role" });
    }
    return errors;
  },
  findExisting(data, stores) {
    const email = text(data, "email");
    const byEmail = email ? stores.users.getByEmail(email) : null;
    if (byEmail) return byEmail.id;
    const id = text(data, "id");
    return id ? (stores.users.get(id)?.id ?? null) : null;
  },
  apply(data, existingId, stores) {
    const fields = {
      name: requiredText(data, "name"),
      email: requiredText(data, "email"),
      role: text(data, "role"),
      isActive: flag(data, "is_active"),
    };
    if (existingId) {
      stores.users.update(existingId, fields);
    } else {
      stores.users.create({ id: text(data, "id"), ...fields });
    }
  },
};

export const ENTITY_HANDLERS: Record<BulkEntity, EntityHandler> = {
  clients: clientsHandler,
  assets: assetsHandler,
  users: usersHandler,
};
