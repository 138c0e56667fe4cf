import { ulid } from "ulid";
import { z } from "zod";
import type { Db } from "../db/connection.js";
import { BULK_ENTITIES, IMPORT_MODES, type BulkEntity, type ImportMode } from "./entities.js";

export const IMPORT_JOB_STATUSES = [
  "uploaded",
  "validating",
  "ready_to_confirm",
  "queued",
  "running",
  "completed",
  "failed",
] as const;
export type ImportJobStatus = (typeof IMPORT_JOB_STATUSES)[number];

export const EXPORT_JOB_STATUSES = ["queued", "running", "completed", "failed"] as const;
export type ExportJobStatus = (typeof EXPORT_JOB_STATUSES)[number];

const cellSchema = z.union([z.string(), z.boolean()]);

export const importPreviewSchema = z.object({
  created: z.number().int(),
  updated: z.number().int(),
  skipped: z.number().int(),
  errors: z.number().int(),
  samples: z.array(z.record(z.string(), cellSchema)),
});
export type ImportPreview = z.infer<typeof importPreviewSchema>;

export const importSummarySchema = z.object({
  created: z.number().int(),
  updated: z.number().int(),
  skipped: z.number().int(),
  errorsCount: z.number().int(),
  warningsCount: z.number().int(),
  error: z.string().optional(),
});
export type ImportSummary = z.infer<typeof importSummarySchema>;

export const exportSummarySchema = z.object({
  exported: z.number().int(),
  error: z.string().optional(),
});
export type ExportSummary = z.infer<typeof exportSummarySchema>;

export interface ImportJobRecord {
  id: string;
  entity: BulkEntity;
  mode: ImportMode;
  status: ImportJobStatus;
  fileKey: string;
  fileName: string;
  fileSize: number;
  fileHash: string;
  templateVersion: string;
  preview: ImportPreview | null;
  summary: ImportSummary | null;
  errorReportKey: string | null;
  createdBy: string | null;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

export interface ExportJobRecord {
  id: string;
  entity: BulkEntity;
  status: ExportJobStatus;
  fileKey: string | null;
  fileName: string | null;
  fileSize: number | null;
  summary: ExportSummary | null;
  createdBy: string | null;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

export interface RowError {
  rowNumber: number;
  field: string;
  message: string;
  severity: "error" | "warning";
}

export type ImportJobPatch = Partial<
  Pick<
    ImportJobRecord,
    "status" | "preview" | "summary" | "errorReportKey" | "startedAt" | "finishedAt"
  >
>;

export type ExportJobPatch = Partial<
  Pick<ExportJobRecord, "status" | "fileKey" | "fileName" | "fileSize" | "summary" | "startedAt" | "finishedAt">
>;

export interface JobStore {
  createImportJob(
    job: Omit<ImportJobRecord, "id" | "preview" | "summary" | "errorReportKey" | "startedAt" | "finishedAt"> & {
      id?: string;
    }
  ): ImportJobRecord;
  getImportJob(id: string): ImportJobRecord | null;
  findImportJobByHash(entity: BulkEntity, fileHash: string): ImportJobRecord[];
  listImportJobs(filter?: { entity?: string; status?: string; limit?: number }): ImportJobRecord[];
  /** Other jobs of the entity in one of the given statuses */
  findActiveImportJob(entity: BulkEntity, statuses: ImportJobStatus[], excludeId: string): ImportJobRecord | null;
  updateImportJob(id: string, patch: ImportJobPatch): ImportJobRecord | null;
  replaceRowErrors(jobId: string, errors: RowError[]): void;
  listRowErrors(jobId: string, limit?: number): RowError[];

  createExportJob(job: { entity: BulkEntity; createdBy: string | null; createdAt: number }): ExportJobRecord;
  getExportJob(id: string): ExportJobRecord | null;
  listExportJobs(limit?: number): ExportJobRecord[];
  updateExportJob(id: string, patch: ExportJobPatch): ExportJobRecord | null;
}

interface ImportJobRow {
  id: string;
  entity: string;
  mode: string;
  status: string;
  file_key: string;
  file_name: string;
  file_size: number;
  file_hash: string;
  template_version: string;
  preview_json: string | null;
  summary_json: string | null;
  error_report_key: string | null;
  created_by: string | null;
  created_at: number;
  started_at: number | null;
  finished_at: number | null;
}

interface ExportJobRow {
  id: string;
  entity: string;
  status: string;
  file_key: string | null;
  file_name: string | null;
  file_size: number | null;
  summary_json: string | null;
  created_by: string | null;
  created_at: number;
  started_at: number | null;
  finished_at: number | null;
}

interface RowErrorRow {
  row_number: number;
  field: string;
  message: string;
  severity: string;
}

const IMPORT_COLUMNS =
  "id, entity, mode, status, file_key, file_name, file_size, file_hash, template_version, preview_json, summary_json, error_report_key, created_by, created_at, started_at, finished_at";

const EXPORT_COLUMNS =
  "id, entity, status, file_key, file_name, file_size, summary_json, created_by, created_at, started_at, finished_at";

const bulkEntitySchema = z.enum(BULK_ENTITIES);
const importModeSchema = z.enum(IMPORT_MODES);
const importStatusSchema = z.enum(IMPORT_JOB_STATUSES);
const exportStatusSchema = z.enum(EXPORT_JOB_STATUSES);

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: string | null): T | null {
  if (!json) return null;
  return schema.parse(JSON.parse(json));
}

function mapImportJob(row: ImportJobRow): ImportJobRecord {
  return {
    id: row.id,
    entity: bulkEntitySchema.parse(row.entity),
    mode: importModeSchema.parse(row.mode),
    status: importStatusSchema.parse(row.status),
    fileKey: row.file_key,
    fileName: row.file_name,
    fileSize: row.file_size,
    fileHash: row.file_hash,
    templateVersion: row.template_version,
    preview: parseJson(importPreviewSchema, row.preview_json),
    summary: parseJson(importSummarySchema, row.summary_json),
    errorReportKey: row.error_report_key,
    createdBy: row.created_by,
    createdAt: row.created_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

function mapExportJob(row: ExportJobRow): ExportJobRecord {
  return {
    id: row.id,
    entity: bulkEntitySchema.parse(row.entity),
    status: exportStatusSchema.parse(row.status),
    fileKey: row.file_key,
    fileName: row.file_name,
    fileSize: row.file_size,
    summary: parseJson(exportSummarySchema, row.summary_json),
    createdBy: row.created_by,
    createdAt: row.created_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

function toJson(value: unknown): string | null | undefined {
  if (value === undefined) return undefined;
  return value === null ? null : JSON.stringify(value);
}

function runPatch(
  db: Db,
  table: string,
  id: string,
  values: Record<string, string | number | null | undefined>
): void {
  const entries = Object.entries(values).filter(
    (entry): entry is [string, string | number | null] => entry[1] !== undefined
  );
  if (entries.length === 0) return;
  const sql = `UPDATE ${table} SET ${entries.map(([c]) => `${c}=?`).join(", ")} WHERE id=?`;
  db.prepare(sql).run(...entries.map(([, v]) => v), id);
}

export function createJobStore(db: Db): JobStore {
  const store: JobStore = {
    createImportJob(job) {
      const id = job.id ?? ulid();
      db.prepare(
        `INSERT INTO import_jobs(id, entity, mode, status, file_key, file_name, file_size, file_hash, template_version, created_by, created_at)
         VALUES(?,?,?,?,?,?,?,?,?,?,?)`
      ).run(
        id,
        job.entity,
        job.mode,
        job.status,
        job.fileKey,
        job.fileName,
        job.fileSize,
        job.fileHash,
        job.templateVersion,
        job.createdBy,
        job.createdAt
      );
      const created = store.getImportJob(id);
      if (!created) throw new Error(`Import job ${id} missing after insert`);
      return created;
    },
    getImportJob(id) {
      const row = db
        .prepare<[string], ImportJobRow>(`SELECT ${IMPORT_COLUMNS} FROM import_jobs WHERE id=?`)
        .get(id);
      return row ? mapImportJob(row) : null;
    },
    findImportJobByHash(entity, fileHash) {
      return db
        .prepare<[string, string], ImportJobRow>(
          `SELECT ${IMPORT_COLUMNS} FROM import_jobs WHERE entity=? AND file_hash=? ORDER BY created_at DESC`
        )
        .all(entity, fileHash)
        .map(mapImportJob);
    },
    listImportJobs(filter = {}) {
      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (filter.entity) {
        clauses.push("entity=?");
        params.push(filter.entity);
      }
      if (filter.status) {
        clauses.push("status=?");
        params.push(filter.status);
      }
      const where = clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "";
      return db
        .prepare<Array<string | number>, ImportJobRow>(
          `SELECT ${IMPORT_COLUMNS} FROM import_jobs${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`
        )
        .all(...params, filter.limit ?? 200)
        .map(mapImportJob);
    },
    findActiveImportJob(entity, statuses, excludeId) {
      if (statuses.length === 0) return null;
      const placeholders = statuses.map(() => "?").join(",");
      const row = db
        .prepare<string[], ImportJobRow>(
          `SELECT ${IMPORT_COLUMNS} FROM import_jobs WHERE entity=? AND id<>? AND status IN (${placeholders}) LIMIT 1`
        )
        .get(entity, excludeId, ...statuses);
      return row ? mapImportJob(row) : null;
    },
    updateImportJob(id, patch) {
      runPatch(db, "import_jobs", id, {
        status: patch.status,
        preview_json: toJson(patch.preview),
        summary_json: toJson(patch.summary),
        error_report_key: patch.errorReportKey,
        started_at: patch.startedAt,
        finished_at: patch.finishedAt,
      });
      return store.getImportJob(id);
    },
    replaceRowErrors(jobId, errors) {
      const insert = db.prepare(
        "INSERT INTO import_row_errors(import_job_id, row_number, field, message, severity) VALUES(?,?,?,?,?)"
      );
      db.transaction(() => {
        db.prepare("DELETE FROM import_row_errors WHERE import_job_id=?").run(jobId);
        for (const e of errors) {
          insert.run(jobId, e.rowNumber, e.field, e.message, e.severity);
        }
      })();
    },
    listRowErrors(jobId, limit = 5000) {
      return db
        .prepare<[string, number], RowErrorRow>(
          "SELECT row_number, field, message, severity FROM import_row_errors WHERE import_job_id=? ORDER BY row_number ASC, id ASC LIMIT ?"
        )
        .all(jobId, limit)
        .map((row): RowError => ({
          rowNumber: row.row_number,
          field: row.field,
          message: row.message,
          severity: row.severity === "warning" ? "warning" : "error",
        }));
    },

    createExportJob(job) {
      const id = ulid();
      db.prepare(
        "INSERT INTO export_jobs(id, entity, status, created_by, created_at) VALUES(?,?,?,?,?)"
      ).run(id, job.entity, "queued", job.createdBy, job.createdAt);
      const created = store.getExportJob(id);
      if (!created) throw new Error(`Export job ${id} missing after insert`);
      return created;
    },
    getExportJob(id) {
      const row = db
        .prepare<[string], ExportJobRow>(`SELECT ${EXPORT_COLUMNS} FROM export_jobs WHERE id=?`)
        .get(id);
      return row ? mapExportJob(row) : null;
    },
    listExportJobs(limit = 200) {
      return db
        .prepare<[number], ExportJobRow>(
          `SELECT ${EXPORT_COLUMNS} FROM export_jobs ORDER BY created_at DESC, rowid DESC LIMIT ?`
        )
        .all(limit)
        .map(mapExportJob);
    },
    updateExportJob(id, patch) {
      runPatch(db, "export_jobs", id, {
        status: patch.status,
        file_key: patch.fileKey,
        file_name: patch.fileName,
        file_size: patch.fileSize,
        summary_json: toJson(patch.summary),
        started_at: patch.startedAt,
        finished_at: patch.finishedAt,
      });
      return store.getExportJob(id);
    },
  };
  return store;
}
