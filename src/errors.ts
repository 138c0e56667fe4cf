/**
 * Errors that carry an HTTP status and a stable error code.
 * Thrown by services; the HTTP layer renders them as `{ ok: false, error }`.
 */

export type ErrorCode =
  | "ERR_INVALID_REQUEST"
  | "ERR_VALIDATION"
  | "ERR_UNAUTHORIZED"
  | "ERR_FORBIDDEN"
  | "ERR_NOT_FOUND"
  | "ERR_CONFLICT"
  | "ERR_INVALID_REFERENCE"
  | "ERR_PAYLOAD_TOO_LARGE"
  | "ERR_RATE_LIMIT"
  | "ERR_IMPORT_INVALID"
  | "ERR_INTERNAL";

export class ApiError extends Error {
  readonly status: number;
  readonly code: ErrorCode;
  readonly details?: string[];

  constructor(status: number, code: ErrorCode, message: string, details?: string[]) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export function notFound(message: string): ApiError {
  return new ApiError(404, "ERR_NOT_FOUND", message);
}

export function badRequest(message: string): ApiError {
  return new ApiError(400, "ERR_INVALID_REQUEST", message);
}

export function conflict(message: string): ApiError {
  return new ApiError(409, "ERR_CONFLICT", message);
}
