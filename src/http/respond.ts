import { ZodError } from "zod";
import type { CsvFile } from "../bulk/exporter.js";
import { StorageError } from "../bulk/storage.js";
import { ConstraintViolationError } from "../db/errors.js";
import { ApiError, type ErrorCode } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { ApiResponse } from "./types.js";

const log = createLogger("http");

const JSON_HEADERS = { "content-type": "application/json" };

export function sendJson(status: number, body: Record<string, unknown>): ApiResponse {
  return { status, headers: { ...JSON_HEADERS }, body: JSON.stringify(body) };
}

export function ok(data: unknown, status = 200): ApiResponse {
  return sendJson(status, { ok: true, data });
}

export function fail(status: number, code: ErrorCode, message: string, details?: string[]): ApiResponse {
  return sendJson(status, { ok: false, error: details ? { code, message, details } : { code, message } });
}

export function sendCsv(file: CsvFile): ApiResponse {
  return {
    status: 200,
    headers: {
      "content-type": "text/csv; charset=utf-8",
      "content-disposition": `attachment; filename="${file.fileName.replace(/"/g, "")}"`,
    },
    body: file.content,
  };
}

export function zodDetails(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/** Map anything a route threw to the error envelope. */
export function errorResponse(err: unknown, context: string): ApiResponse {
  if (err instanceof ApiError) {
    return fail(err.status, err.code, err.message, err.details);
  }
  if (err instanceof ZodError) {
    return fail(400, "ERR_VALIDATION", "Invalid request body", zodDetails(err));
  }
  if (err instanceof ConstraintViolationError) {
    switch (err.kind) {
      case "unique":
      case "primary_key":
        return fail(409, "ERR_CONFLICT", err.message);
      case "foreign_key":
        return fail(422, "ERR_INVALID_REFERENCE", "Referenced record does not exist");
      default:
        return fail(400, "ERR_INVALID_REQUEST", err.message);
    }
  }
  if (err instanceof StorageError) {
    return err.reason === "not_found"
      ? fail(404, "ERR_NOT_FOUND", err.message)
      : fail(400, "ERR_INVALID_REQUEST", err.message);
  }
  log.error(`Unhandled error in ${context}:`, err);
  return fail(500, "ERR_INTERNAL", "Internal error");
}
