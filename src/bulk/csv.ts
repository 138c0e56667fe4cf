import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

export interface CsvRow {
  /** 1-based record number in the file; the header is record 1 */
  rowNumber: number;
  cells: string[];
}

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
  /** True when the record after the header held column instructions and was dropped */
  hadInstructionRow: boolean;
}

const INSTRUCTION_KEYWORDS = ["required", "optional", "separate", "yes/no", "default"];

/**
 * A template's second record describes the columns ("Required",
 * "Optional (yes/no)"...). It counts as an instruction row when at least
 * 60% of its cells are blank or contain one of the keywords.
 */
export function isInstructionRow(cells: string[]): boolean {
  if (cells.length === 0) return false;
  let hits = 0;
  for (const cell of cells) {
    const raw = cell.trim().toLowerCase();
    if (!raw || INSTRUCTION_KEYWORDS.some((k) => raw.includes(k))) {
      hits += 1;
    }
  }
  return hits >= Math.max(1, Math.floor(cells.length * 0.6));
}

function toRecords(output: unknown): string[][] {
  if (!Array.isArray(output)) return [];
  return output.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? "")) : []
  );
}

export function readCsv(content: Buffer | string): CsvTable {
  const records = toRecords(
    parse(content, {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: false,
    })
  );
  if (records.length === 0) {
    return { header: [], rows: [], hadInstructionRow: false };
  }

  const header = records[0].map((h) => h.trim());
  let rows: CsvRow[] = records.slice(1).map((cells, index) => ({
    rowNumber: index + 2,
    cells: cells.map((c) => c.trim()),
  }));

  const hadInstructionRow = rows.length > 0 && isInstructionRow(rows[0].cells);
  if (hadInstructionRow) rows = rows.slice(1);

  return { header, rows, hadInstructionRow };
}

export function writeCsv(records: ReadonlyArray<ReadonlyArray<string>>): string {
  return stringify(records.map((r) => [...r]));
}
