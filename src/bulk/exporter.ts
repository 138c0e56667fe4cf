import { notFound } from "../errors.js";
import type { Stores } from "../store/index.js";
import { createLogger } from "../utils/logger.js";
import { writeCsv } from "./csv.js";
import { ENTITY_CONFIGS, type BulkEntity } from "./entities.js";
import type { BulkDeps } from "./importer.js";

const log = createLogger("bulk:export");

export interface CsvFile {
  fileName: string;
  content: string;
}

export interface ExportFile extends CsvFile {
  count: number;
}

type ExportCell = string | boolean | null;

/** Blank template: the header labels and one row of column instructions. */
export function buildTemplate(entity: BulkEntity): CsvFile {
  const config = ENTITY_CONFIGS[entity];
  return {
    fileName: `template_${entity}_${config.templateVersion}.csv`,
    content: writeCsv([
      config.columns.map((c) => c.label),
      config.columns.map((c) => c.instruction),
    ]),
  };
}

function exportRows(stores: Stores, entity: BulkEntity): Array<Record<string, ExportCell>> {
  switch (entity) {
    case "clients":
      return stores.clients.listAll().map((c) => ({
        id: c.id,
        name: c.name,
        document: c.document,
        address: c.address,
        is_active: c.isActive,
      }));
    case "assets": {
      const documents = new Map(stores.clients.listAll().map((c) => [c.id, c.document]));
      return stores.assets.listAll().map((a) => ({
        id: a.id,
        name: a.name,
        client_id: a.clientId,
        client_document: documents.get(a.clientId) ?? null,
        type: a.type,
        location: a.location,
        status: a.status,
        is_active: a.isActive,
      }));
    }
    case "users":
      return stores.users.listAll().map((u) => ({
        id: u.id,
        name: u.name,
        email: u.email,
        role: u.role,
        is_active: u.isActive,
      }));
  }
}

function formatCell(value: ExportCell | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "yes" : "no";
  return value;
}

export function exportFileName(entity: BulkEntity, now: number): string {
  const stamp = new Date(now).toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return `export_${entity}_${stamp}.csv`;
}

/**
 * Every record of the entity, inactive ones included, in the template's
 * column layout so the file can be edited and imported back.
 */
export function buildExport(stores: Stores, entity: BulkEntity, now: number = Date.now()): ExportFile {
  const config = ENTITY_CONFIGS[entity];
  const rows = exportRows(stores, entity);
  const records = [
    config.columns.map((c) => c.label),
    ...rows.map((row) => config.columns.map((c) => formatCell(row[c.key]))),
  ];
  return { fileName: exportFileName(entity, now), content: writeCsv(records), count: rows.length };
}

export function countExportRows(stores: Stores, entity: BulkEntity): number {
  switch (entity) {
    case "clients":
      return stores.clients.count({ includeInactive: true });
    case "assets":
      return stores.assets.count({ includeInactive: true });
    case "users":
      return stores.users.count({ includeInactive: true });
  }
}

export async function runExportJob(deps: BulkDeps, jobId: string): Promise<void> {
  const now = deps.now ?? Date.now;
  const job = deps.jobs.getExportJob(jobId);
  if (!job) throw notFound(`Export job not found: ${jobId}`);
  if (job.status !== "queued") {
    log.info(`Export job ${job.id} is ${job.status}; nothing to run`);
    return;
  }

  deps.jobs.updateExportJob(job.id, { status: "running", startedAt: now() });
  try {
    const file = buildExport(deps.stores, job.entity, now());
    const key = `exports/${job.entity}/${job.id}.csv`;
    const stored = await deps.storage.put(key, file.content);
    deps.jobs.updateExportJob(job.id, {
      status: "completed",
      fileKey: stored.key,
      fileName: file.fileName,
      fileSize: stored.size,
      summary: { exported: file.count },
      finishedAt: now(),
    });
    log.info(`Export ${job.id} completed: ${file.count} ${job.entity}`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    deps.jobs.updateExportJob(job.id, {
      status: "failed",
      summary: { exported: 0, error: message },
      finishedAt: now(),
    });
    log.error(`Export ${job.id} failed: ${message}`);
  }
}
