export type ConstraintKind =
  | "unique"
  | "primary_key"
  | "foreign_key"
  | "not_null"
  | "check";

const CODE_TO_KIND: Record<string, ConstraintKind> = {
  SQLITE_CONSTRAINT_UNIQUE: "unique",
  SQLITE_CONSTRAINT_PRIMARYKEY: "primary_key",
  SQLITE_CONSTRAINT_FOREIGNKEY: "foreign_key",
  SQLITE_CONSTRAINT_NOTNULL: "not_null",
  SQLITE_CONSTRAINT_CHECK: "check",
};

/** A write rejected by a schema constraint. */
export class ConstraintViolationError extends Error {
  readonly kind: ConstraintKind;
  readonly code: string;

  constructor(kind: ConstraintKind, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConstraintViolationError";
    this.kind = kind;
    this.code = code;
  }
}

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

/**
 * Translate a driver constraint error into a ConstraintViolationError.
 * Anything else is returned as-is.
 */
export function translateDbError(err: unknown): unknown {
  const code = sqliteCode(err);
  if (!code || !code.startsWith("SQLITE_CONSTRAINT")) return err;
  const kind = CODE_TO_KIND[code] ?? "check";
  const message = err instanceof Error ? err.message : String(err);
  return new ConstraintViolationError(kind, code, message, { cause: err });
}

/** Run a write and rethrow constraint failures in translated form. */
export function withConstraints<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw translateDbError(err);
  }
}
