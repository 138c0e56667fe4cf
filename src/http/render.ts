import type { ExportJobRecord, ImportJobRecord } from "../bulk/job-store.js";
import { epochToIso } from "../db/time.js";
import type { UserRecord } from "../store/users.js";

export type PublicUser = Omit<UserRecord, "passwordHash">;

export function renderUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    role: user.role,
    isActive: user.isActive,
    createdAt: user.createdAt,
  };
}

export function renderImportJob(job: ImportJobRecord) {
  return {
    id: job.id,
    entity: job.entity,
    mode: job.mode,
    status: job.status,
    fileName: job.fileName,
    fileSize: job.fileSize,
    fileHash: job.fileHash,
    templateVersion: job.templateVersion,
    preview: job.preview,
    summary: job.summary,
    hasErrorReport: job.errorReportKey !== null,
    createdBy: job.createdBy,
    createdAt: epochToIso(job.createdAt),
    startedAt: epochToIso(job.startedAt),
    finishedAt: epochToIso(job.finishedAt),
  };
}

export function renderExportJob(job: ExportJobRecord) {
  return {
    id: job.id,
    entity: job.entity,
    status: job.status,
    fileName: job.fileName,
    fileSize: job.fileSize,
    summary: job.summary,
    createdBy: job.createdBy,
    createdAt: epochToIso(job.createdAt),
    startedAt: epochToIso(job.startedAt),
    finishedAt: epochToIso(job.finishedAt),
  };
}
