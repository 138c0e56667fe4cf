/**
 * Import/export definitions per entity: template columns, unique-key
 * groups used to find existing records, and per-column transformers.
 */

export const BULK_ENTITIES = ["clients", "assets", "users"] as const;
export type BulkEntity = (typeof BULK_ENTITIES)[number];

export const IMPORT_MODES = ["upsert", "create_only", "update_only"] as const;
export type ImportMode = (typeof IMPORT_MODES)[number];

export type CellValue = string | boolean;
export type RowData = Record<string, CellValue>;
export type Transformer = (raw: string) => CellValue;

export interface TemplateColumn {
  label: string;
  key: string;
  instruction: string;
  required: boolean;
}

export interface EntityImportConfig {
  entity: BulkEntity;
  templateVersion: string;
  columns: TemplateColumn[];
  /** First group whose columns are all filled identifies the row. */
  uniqueKeyGroups: string[][];
  transformers: Record<string, Transformer>;
}

export function isBulkEntity(value: string): value is BulkEntity {
  return (BULK_ENTITIES as readonly string[]).includes(value);
}

export function isImportMode(value: string): value is ImportMode {
  return (IMPORT_MODES as readonly string[]).includes(value);
}

export const normalizeText: Transformer = (raw) => raw.trim();
export const normalizeEmail: Transformer = (raw) => raw.trim().toLowerCase();
export const normalizeDigits: Transformer = (raw) => raw.replace(/\D/g, "");
export const normalizeLower: Transformer = (raw) => raw.trim().toLowerCase();
export const normalizeBool: Transformer = (raw) =>
  ["yes", "true", "1", "sim", "y"].includes(raw.trim().toLowerCase());

function column(label: string, key: string, instruction: string, required = false): TemplateColumn {
  return { label, key, instruction, required };
}

export const ENTITY_CONFIGS: Record<BulkEntity, EntityImportConfig> = {
  clients: {
    entity: "clients",
    templateVersion: "v1",
    columns: [
      column("ID", "id", "Optional"),
      column("Name", "name", "Required", true),
      column("Document", "document", "Optional (11 or 14 digits)"),
      column("Address", "address", "Optional"),
      column("Active", "is_active", "Optional (yes/no)"),
    ],
    uniqueKeyGroups: [["id"], ["document"]],
    transformers: {
      id: normalizeText,
      name: normalizeText,
      document: normalizeDigits,
      address: normalizeText,
      is_active: normalizeBool,
    },
  },
  assets: {
    entity: "assets",
    templateVersion: "v1",
    columns: [
      column("ID", "id", "Optional"),
      column("Name", "name", "Required", true),
      column("Client ID", "client_id", "Required if client document is empty"),
      column("Client document", "client_document", "Required if client ID is empty"),
      column("Type", "type", "Optional"),
      column("Location", "location", "Optional"),
      column("Status", "status", "Optional (operating/maintenance/stopped/decommissioned)"),
      column("Active", "is_active", "Optional (yes/no)"),
    ],
    uniqueKeyGroups: [["id"], ["client_id", "name"], ["client_document", "name"]],
    transformers: {
      id: normalizeText,
      name: normalizeText,
      client_id: normalizeText,
      client_document: normalizeDigits,
      type: normalizeText,
      location: normalizeText,
      status: normalizeLower,
      is_active: normalizeBool,
    },
  },
  users: {
    entity: "users",
    templateVersion: "v1",
    columns: [
      column("ID", "id", "Optional"),
      column("Name", "name", "Required", true),
      column("Email", "email", "Required", true),
      column("Role", "role", "Optional (admin/manager/technician/user)"),
      column("Active", "is_active", "Optional (yes/no)"),
    ],
    uniqueKeyGroups: [["email"]],
    transformers: {
      id: normalizeText,
      name: normalizeText,
      email: normalizeEmail,
      role: normalizeLower,
      is_active: normalizeBool,
    },
  },
};

/**
 * Lower-case ASCII identifier: accents stripped, spaces and dashes become
 * underscores, anything else outside [a-z0-9_] is dropped.
 */
export function normalizeHeader(value: string): string {
  if (!value) return "";
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .trim()
    .replace(/[\s-]+/g, "_")
    .replace(/[^a-z0-9_]/g, "");
}

/** Maps normalized labels and keys to column keys. */
export function makeHeaderMap(columns: TemplateColumn[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const col of columns) {
    map.set(normalizeHeader(col.label), col.key);
    map.set(normalizeHeader(col.key), col.key);
  }
  return map;
}

export function labelForKey(config: EntityImportConfig, key: string): string {
  return config.columns.find((c) => c.key === key)?.label ?? key;
}
