/**
 * SQLite's CURRENT_TIMESTAMP is UTC text "YYYY-MM-DD HH:MM:SS". Values the
 * application writes use the same shape so they sort alongside defaults.
 */

export function toSqlTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function sqlTimestampToIso(value: string): string {
  const normalized = value.includes("T") ? value : `${value.replace(" ", "T")}Z`;
  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) return value;
  return date.toISOString();
}

export function nullableSqlTimestampToIso(value: string | null): string | null {
  return value === null ? null : sqlTimestampToIso(value);
}

export function epochToIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}
