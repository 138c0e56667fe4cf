import { ApiError, notFound } from "../errors.js";
import type { Stores } from "../store/index.js";
import { ConstraintViolationError } from "../db/errors.js";
import { createLogger } from "../utils/logger.js";
import { readCsv, writeCsv, type CsvRow } from "./csv.js";
import {
  ENTITY_CONFIGS,
  labelForKey,
  makeHeaderMap,
  normalizeHeader,
  type EntityImportConfig,
  type ImportMode,
  type RowData,
} from "./entities.js";
import { ENTITY_HANDLERS } from "./handlers.js";
import type { ImportJobRecord, ImportPreview, ImportSummary, JobStore, RowError } from "./job-store.js";
import type { ObjectStorage } from "./storage.js";

const log = createLogger("bulk:import");

export const APPLY_CHUNK_SIZE = 500;
export const PREVIEW_SAMPLE_LIMIT = 20;

export interface BulkDeps {
  stores: Stores;
  jobs: JobStore;
  storage: ObjectStorage;
  now?: () => number;
}

/** The uploaded file cannot be read as an import of its entity. */
export class ImportValidationError extends ApiError {
  constructor(message: string) {
    super(400, "ERR_IMPORT_INVALID", message);
    this.name = "ImportValidationError";
  }
}

export type RowAction = "create" | "update" | "skip" | "error";

export interface AnalyzedRow {
  rowNumber: number;
  cells: string[];
  data: RowData;
  action: RowAction;
  existingId: string | null;
  errors: RowError[];
}

export interface ParsedImport {
  header: string[];
  /** Column key per header position; null for columns the entity does not know */
  keys: Array<string | null>;
  rows: CsvRow[];
}

export interface ImportAnalysis {
  rows: AnalyzedRow[];
  errors: RowError[];
  preview: ImportPreview;
}

export function parseImportFile(config: EntityImportConfig, content: Buffer | string): ParsedImport {
  const table = readCsv(content);
  if (table.header.length === 0) {
    throw new ImportValidationError("File is empty");
  }
  const headerMap = makeHeaderMap(config.columns);
  const keys = table.header.map((h) => headerMap.get(normalizeHeader(h)) ?? null);
  const missing = config.columns
    .filter((col) => col.required && !keys.includes(col.key))
    .map((col) => col.label.toUpperCase());
  if (missing.length > 0) {
    throw new ImportValidationError(`Missing column ${missing.join(", ")}`);
  }
  return { header: table.header, keys, rows: table.rows };
}

function transformCells(
  config: EntityImportConfig,
  keys: Array<string | null>,
  row: CsvRow
): { data: RowData; errors: RowError[] } {
  const data: RowData = {};
  const errors: RowError[] = [];
  keys.forEach((key, index) => {
    if (!key) return;
    const raw = (row.cells[index] ?? "").trim();
    if (!raw) return;
    const transform = config.transformers[key];
    try {
      data[key] = transform ? transform(raw) : raw;
    } catch (err) {
      errors.push({
        rowNumber: row.rowNumber,
        field: key,
        message: `Invalid value for ${labelForKey(config, key)}: ${err instanceof Error ? err.message : String(err)}`,
        severity: "error",
      });
    }
  });
  return { data, errors };
}

function uniqueKeyOf(config: EntityImportConfig, data: RowData): string | null {
  for (const group of config.uniqueKeyGroups) {
    const values = group.map((key) => data[key]);
    if (values.every((v) => v !== undefined && v !== "")) {
      return `${group.join("+")}=${values.map(String).join("|")}`;
    }
  }
  return null;
}

function actionFor(mode: ImportMode, exists: boolean): RowAction {
  if (mode === "create_only" && exists) return "skip";
  if (mode === "update_only" && !exists) return "skip";
  return exists ? "update" : "create";
}

/**
 * Decide what every row would do without writing anything. Blank rows are
 * ignored; rows with errors get action "error".
 */
export function analyzeImport(
  stores: Stores,
  config: EntityImportConfig,
  mode: ImportMode,
  parsed: ParsedImport
): ImportAnalysis {
  const handler = ENTITY_HANDLERS[config.entity];
  const seenKeys = new Map<string, number>();
  const rows: AnalyzedRow[] = [];
  const allErrors: RowError[] = [];
  const preview: ImportPreview = { created: 0, updated: 0, skipped: 0, errors: 0, samples: [] };

  for (const row of parsed.rows) {
    if (row.cells.every((c) => !c.trim())) continue;

    const { data, errors } = transformCells(config, parsed.keys, row);
    const addError = (field: string, message: string) =>
      errors.push({ rowNumber: row.rowNumber, field, message, severity: "error" });

    for (const col of config.columns) {
      if (col.required && (data[col.key] === undefined || data[col.key] === "")) {
        addError(col.key, "Required field");
      }
    }
    for (const fieldError of handler.validate(data, stores)) {
      addError(fieldError.field, fieldError.message);
    }

    const key = uniqueKeyOf(config, data);
    if (key === null) {
      addError(config.uniqueKeyGroups[0].join("+"), "Missing unique key");
    } else {
      const firstRow = seenKeys.get(key);
      if (firstRow !== undefined) {
        addError(key.split("=")[0], `Duplicate key in file (row ${firstRow})`);
      } else {
        seenKeys.set(key, row.rowNumber);
      }
    }

    let action: RowAction = "error";
    let existingId: string | null = null;
    if (errors.length === 0) {
      existingId = handler.findExisting(data, stores);
      action = actionFor(mode, existingId !== null);
    }

    switch (action) {
      case "create":
        preview.created += 1;
        break;
      case "update":
        preview.updated += 1;
        break;
      case "skip":
        preview.skipped += 1;
        break;
      case "error":
        preview.errors += 1;
        break;
    }
    if (action !== "error" && preview.samples.length < PREVIEW_SAMPLE_LIMIT) {
      preview.samples.push(data);
    }

    allErrors.push(...errors);
    rows.push({ rowNumber: row.rowNumber, cells: row.cells, data, action, existingId, errors });
  }

  return { rows, errors: allErrors, preview };
}

/** CSV of the failing rows: the uploaded columns plus status, fields and messages. */
export function buildErrorReport(header: string[], rows: AnalyzedRow[]): string {
  const records: string[][] = [[...header, "__status", "__error_fields", "__messages"]];
  for (const row of rows) {
    if (row.errors.length === 0) continue;
    const cells = header.map((_, i) => row.cells[i] ?? "");
    const fields = [...new Set(row.errors.map((e) => e.field))].sort();
    const messages = row.errors.map((e) => e.message);
    records.push([...cells, "ERROR", fields.join(";"), messages.join(";")]);
  }
  return writeCsv(records);
}

export function errorReportKey(job: Pick<ImportJobRecord, "id" | "entity">): string {
  return `errors/${job.entity}/${job.id}.csv`;
}

const VALIDATABLE_STATUSES = new Set(["uploaded", "ready_to_confirm", "failed"]);

export interface ValidationResult {
  job: ImportJobRecord;
  preview: ImportPreview;
}

/**
 * Dry-run the uploaded file: record row errors and a preview, and move the
 * job to ready_to_confirm (or failed when any row has errors).
 */
export async function validateImportJob(deps: BulkDeps, jobId: string): Promise<ValidationResult> {
  const now = deps.now ?? Date.now;
  const job = deps.jobs.getImportJob(jobId);
  if (!job) throw notFound(`Import job not found: ${jobId}`);
  if (!VALIDATABLE_STATUSES.has(job.status)) {
    throw new ApiError(409, "ERR_CONFLICT", `Import job is ${job.status}`);
  }

  deps.jobs.updateImportJob(job.id, { status: "validating" });
  const config = ENTITY_CONFIGS[job.entity];

  let analysis: ImportAnalysis;
  let updated: ImportJobRecord | null;
  try {
    const parsed = parseImportFile(config, await deps.storage.get(job.fileKey));
    analysis = analyzeImport(deps.stores, config, job.mode, parsed);
    deps.jobs.replaceRowErrors(job.id, analysis.errors);

    let reportKey: string | null = null;
    if (analysis.errors.length > 0) {
      reportKey = errorReportKey(job);
      await deps.storage.put(reportKey, buildErrorReport(parsed.header, analysis.rows));
    }

    updated = deps.jobs.updateImportJob(job.id, {
      status: analysis.errors.length > 0 ? "failed" : "ready_to_confirm",
      preview: analysis.preview,
      errorReportKey: reportKey,
      summary: null,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    deps.jobs.updateImportJob(job.id, {
      status: "failed",
      preview: null,
      errorReportKey: null,
      summary: emptySummary(message),
    });
    deps.jobs.replaceRowErrors(job.id, []);
    if (!(err instanceof ImportValidationError)) {
      log.error(`Validation of import ${job.id} failed: ${message}`);
    }
    throw err;
  }
  if (!updated) throw notFound(`Import job not found: ${jobId}`);

  deps.stores.audit.insert({
    time: now(),
    userId: job.createdBy,
    action: "bulk.import.validate",
    resourceType: "import_job",
    resourceId: job.id,
    metadata: {
      created: analysis.preview.created,
      updated: analysis.preview.updated,
      skipped: analysis.preview.skipped,
      errors: analysis.preview.errors,
    },
  });
  log.info(
    `Validated import ${job.id} (${job.entity}): ${analysis.preview.created} create, ${analysis.preview.updated} update, ${analysis.preview.errors} errors`
  );
  return { job: updated, preview: analysis.preview };
}

function emptySummary(error?: string): ImportSummary {
  return { created: 0, updated: 0, skipped: 0, errorsCount: 0, warningsCount: 0, ...(error ? { error } : {}) };
}

/**
 * Apply a confirmed import. The file is analyzed again against the current
 * data, then written in transactions of APPLY_CHUNK_SIZE rows. Rows that
 * fail validation or hit a constraint are counted and skipped.
 */
export async function runImportJob(deps: BulkDeps, jobId: string): Promise<void> {
  const now = deps.now ?? Date.now;
  const job = deps.jobs.getImportJob(jobId);
  if (!job) {
    log.warn(`Import job ${jobId} disappeared before it ran`);
    return;
  }
  if (job.status !== "queued" && job.status !== "running") {
    log.info(`Import job ${job.id} is ${job.status}; nothing to run`);
    return;
  }

  deps.jobs.updateImportJob(job.id, { status: "running", startedAt: now() });
  const config = ENTITY_CONFIGS[job.entity];
  const handler = ENTITY_HANDLERS[job.entity];

  try {
    const parsed = parseImportFile(config, await deps.storage.get(job.fileKey));
    const analysis = analyzeImport(deps.stores, config, job.mode, parsed);
    const rowErrors = [...analysis.errors];
    const summary = emptySummary();

    const applyChunk = deps.stores.db.transaction((chunk: AnalyzedRow[]) => {
      for (const row of chunk) {
        if (row.action === "error") {
          summary.errorsCount += 1;
          continue;
        }
        if (row.action === "skip") {
          summary.skipped += 1;
          continue;
        }
        try {
          handler.apply(row.data, row.existingId, deps.stores);
          if (row.action === "create") summary.created += 1;
          else summary.updated += 1;
        } catch (err) {
          if (!(err instanceof ConstraintViolationError)) throw err;
          summary.errorsCount += 1;
          rowErrors.push({ rowNumber: row.rowNumber, field: err.kind, message: err.message, severity: "error" });
        }
      }
    });

    for (let i = 0; i < analysis.rows.length; i += APPLY_CHUNK_SIZE) {
      applyChunk(analysis.rows.slice(i, i + APPLY_CHUNK_SIZE));
    }

    summary.warningsCount = rowErrors.filter((e) => e.severity === "warning").length;
    deps.jobs.replaceRowErrors(job.id, rowErrors);
    deps.jobs.updateImportJob(job.id, { status: "completed", summary, finishedAt: now() });
    deps.stores.audit.insert({
      time: now(),
      userId: job.createdBy,
      action: "bulk.import.completed",
      resourceType: "import_job",
      resourceId: job.id,
      metadata: { ...summary },
    });
    log.info(
      `Import ${job.id} completed: ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped, ${summary.errorsCount} errors`
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    deps.jobs.updateImportJob(job.id, {
      status: "failed",
      summary: emptySummary(message),
      finishedAt: now(),
    });
    deps.stores.audit.insert({
      time: now(),
      userId: job.createdBy,
      action: "bulk.import.failed",
      resourceType: "import_job",
      resourceId: job.id,
      metadata: { error: message },
    });
    log.error(`Import ${job.id} failed: ${message}`);
  }
}
