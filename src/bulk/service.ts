/**
 * Bulk import/export workflow.
 *
 * Import: upload → validate (preview, row errors, error report) → confirm,
 * after which the task queue applies the file. Export: small entities are
 * returned inline, large ones become export jobs.
 */

import { createHash } from "node:crypto";
import { ulid } from "ulid";
import type { BulkConfig } from "../config/schema.js";
import { ApiError, badRequest, conflict, notFound } from "../errors.js";
import type { Stores } from "../store/index.js";
import { createLogger } from "../utils/logger.js";
import { ENTITY_CONFIGS, BULK_ENTITIES, type BulkEntity, type ImportMode, type TemplateColumn } from "./entities.js";
import { buildExport, buildTemplate, countExportRows, runExportJob, type CsvFile, type ExportFile } from "./exporter.js";
import { runImportJob, validateImportJob, type BulkDeps, type ValidationResult } from "./importer.js";
import type { ExportJobRecord, ImportJobRecord, ImportJobStatus, JobStore, RowError } from "./job-store.js";
import type { TaskQueue } from "./queue.js";
import { safeFileName, type ObjectStorage } from "./storage.js";

const log = createLogger("bulk");

/** A file in one of these states blocks a second upload of the same content. */
const IN_FLIGHT_STATUSES: ImportJobStatus[] = ["validating", "ready_to_confirm", "queued", "running"];

export interface EntityDescription {
  entity: BulkEntity;
  templateVersion: string;
  columns: TemplateColumn[];
  uniqueKeyGroups: string[][];
}

export interface UploadInput {
  entity: BulkEntity;
  mode: ImportMode;
  fileName: string;
  content: Buffer;
  userId: string | null;
}

export type ExportResult =
  | { kind: "inline"; file: ExportFile }
  | { kind: "job"; job: ExportJobRecord };

export interface BulkService {
  listEntities(): EntityDescription[];
  template(entity: BulkEntity): CsvFile;
  upload(input: UploadInput): Promise<ImportJobRecord>;
  validate(jobId: string): Promise<ValidationResult>;
  confirm(jobId: string, userId: string | null): ImportJobRecord;
  getImportJob(jobId: string): ImportJobRecord;
  listImportJobs(filter?: { entity?: string; status?: string }): ImportJobRecord[];
  listRowErrors(jobId: string): RowError[];
  errorReport(jobId: string): Promise<CsvFile>;
  exportEntity(entity: BulkEntity, userId: string | null): ExportResult;
  getExportJob(jobId: string): ExportJobRecord;
  listExportJobs(): ExportJobRecord[];
  downloadExport(jobId: string): Promise<CsvFile>;
}

export interface BulkServiceOptions {
  stores: Stores;
  jobs: JobStore;
  storage: ObjectStorage;
  queue: TaskQueue;
  config: BulkConfig;
  now?: () => number;
}

export function createBulkService(opts: BulkServiceOptions): BulkService {
  const { stores, jobs, storage, queue, config } = opts;
  const now = opts.now ?? Date.now;
  const deps: BulkDeps = { stores, jobs, storage, now };

  function requireImportJob(jobId: string): ImportJobRecord {
    const job = jobs.getImportJob(jobId);
    if (!job) throw notFound(`Import job not found: ${jobId}`);
    return job;
  }

  function requireExportJob(jobId: string): ExportJobRecord {
    const job = jobs.getExportJob(jobId);
    if (!job) throw notFound(`Export job not found: ${jobId}`);
    return job;
  }

  return {
    listEntities() {
      return BULK_ENTITIES.map((entity) => {
        const cfg = ENTITY_CONFIGS[entity];
        return {
          entity,
          templateVersion: cfg.templateVersion,
          columns: cfg.columns,
          uniqueKeyGroups: cfg.uniqueKeyGroups,
        };
      });
    },

    template(entity) {
      return buildTemplate(entity);
    },

    async upload(input) {
      if (!input.fileName.toLowerCase().endsWith(".csv")) {
        throw badRequest("Only .csv files are supported");
      }
      if (input.content.length === 0) {
        throw badRequest("File is empty");
      }
      if (input.content.length > config.maxFileBytes) {
        throw new ApiError(413, "ERR_PAYLOAD_TOO_LARGE", `File exceeds ${config.maxFileBytes} bytes`);
      }

      const fileHash = createHash("sha256").update(input.content).digest("hex");
      const previous = jobs.findImportJobByHash(input.entity, fileHash);
      if (previous.some((job) => job.status === "completed")) {
        throw conflict("This file was already processed");
      }
      if (previous.some((job) => IN_FLIGHT_STATUSES.includes(job.status))) {
        throw conflict("This file is already being processed");
      }

      const id = ulid();
      const stored = await storage.put(
        `imports/${input.entity}/${id}/${safeFileName(input.fileName)}`,
        input.content
      );
      const job = jobs.createImportJob({
        id,
        entity: input.entity,
        mode: input.mode,
        status: "uploaded",
        fileKey: stored.key,
        fileName: input.fileName,
        fileSize: stored.size,
        fileHash,
        templateVersion: ENTITY_CONFIGS[input.entity].templateVersion,
        createdBy: input.userId,
        createdAt: now(),
      });
      stores.audit.insert({
        time: now(),
        userId: input.userId,
        action: "bulk.import.upload",
        resourceType: "import_job",
        resourceId: job.id,
        metadata: { entity: job.entity, mode: job.mode, fileName: job.fileName, fileSize: job.fileSize },
      });
      log.info(`Uploaded ${job.fileName} for ${job.entity} import ${job.id}`);
      return job;
    },

    validate(jobId) {
      return validateImportJob(deps, jobId);
    },

    confirm(jobId, userId) {
      const job = requireImportJob(jobId);
      if (job.status !== "ready_to_confirm") {
        throw badRequest(`Import job is ${job.status}; only validated jobs can be confirmed`);
      }
      const other = jobs.findActiveImportJob(job.entity, ["queued", "running"], job.id);
      if (other) {
        throw conflict(`Another ${job.entity} import is in progress (${other.id})`);
      }

      const queued = jobs.updateImportJob(job.id, { status: "queued" });
      if (!queued) throw notFound(`Import job not found: ${jobId}`);
      stores.audit.insert({
        time: now(),
        userId,
        action: "bulk.import.confirm",
        resourceType: "import_job",
        resourceId: job.id,
        metadata: null,
      });
      queue.enqueue(`import:${job.id}`, () => runImportJob(deps, job.id));
      return queued;
    },

    getImportJob: requireImportJob,

    listImportJobs(filter = {}) {
      return jobs.listImportJobs(filter);
    },

    listRowErrors(jobId) {
      requireImportJob(jobId);
      return jobs.listRowErrors(jobId);
    },

    async errorReport(jobId) {
      const job = requireImportJob(jobId);
      if (!job.errorReportKey) throw notFound(`No error report for import job ${jobId}`);
      const content = await storage.get(job.errorReportKey);
      return { fileName: `errors_${job.entity}_${job.id}.csv`, content: content.toString("utf8") };
    },

    exportEntity(entity, userId) {
      const count = countExportRows(stores, entity);
      if (count <= config.exportSyncLimit) {
        const file = buildExport(stores, entity, now());
        stores.audit.insert({
          time: now(),
          userId,
          action: "bulk.export",
          resourceType: "entity",
          resourceId: entity,
          metadata: { count: file.count },
        });
        return { kind: "inline", file };
      }

      const job = jobs.createExportJob({ entity, createdBy: userId, createdAt: now() });
      stores.audit.insert({
        time: now(),
        userId,
        action: "bulk.export.queued",
        resourceType: "export_job",
        resourceId: job.id,
        metadata: { entity, count },
      });
      queue.enqueue(`export:${job.id}`, () => runExportJob(deps, job.id));
      return { kind: "job", job };
    },

    getExportJob: requireExportJob,

    listExportJobs() {
      return jobs.listExportJobs();
    },

    async downloadExport(jobId) {
      const job = requireExportJob(jobId);
      if (job.status !== "completed" || !job.fileKey) {
        throw conflict(`Export job is ${job.status}`);
      }
      const content = await storage.get(job.fileKey);
      return {
        fileName: job.fileName ?? `export_${job.entity}_${job.id}.csv`,
        content: content.toString("utf8"),
      };
    },
  };
}
