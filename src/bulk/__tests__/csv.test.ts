import { describe, it, expect } from "vitest";
import { isInstructionRow, readCsv, writeCsv } from "../csv.js";
import { ENTITY_CONFIGS, makeHeaderMap, normalizeBool, normalizeHeader } from "../entities.js";

describe("normalizeHeader", () => {
  it("lower-cases and joins words with underscores", () => {
    expect(normalizeHeader("Client document")).toBe("client_document");
    expect(normalizeHeader("  E-mail ")).toBe("e_mail");
  });

  it("strips accents and punctuation", () => {
    expect(normalizeHeader("Ação Técnica")).toBe("acao_tecnica");
    expect(normalizeHeader("Name*")).toBe("name");
  });

  it("maps labels and keys to the same column", () => {
    const map = makeHeaderMap(ENTITY_CONFIGS.assets.columns);
    expect(map.get(normalizeHeader("Client ID"))).toBe("client_id");
    expect(map.get(normalizeHeader("client_id"))).toBe("client_id");
    expect(map.get(normalizeHeader("Active"))).toBe("is_active");
  });
});

describe("normalizeBool", () => {
  it("accepts the usual truthy spellings", () => {
    expect(["yes", "TRUE", "1", "sim", "Y"].map(normalizeBool)).toEqual([true, true, true, true, true]);
    expect(["no", "0", "maybe"].map(normalizeBool)).toEqual([false, false, false]);
  });
});

describe("isInstructionRow", () => {
  it("detects template instructions", () => {
    expect(isInstructionRow(["Required", "Optional (yes/no)", ""])).toBe(true);
  });

  it("does not mistake data for instructions", () => {
    expect(isInstructionRow(["Ana", "ana@example.com", "admin"])).toBe(false);
    expect(isInstructionRow(["New Co", "98765432000199", "", "no"])).toBe(false);
  });
});

describe("readCsv", () => {
  it("drops the BOM and the instruction row and keeps file line numbers", () => {
    const table = readCsv(
      "﻿Name,Email\nRequired,Required\nAna,ana@example.com\n,\nBruno,bruno@example.com\n"
    );
    expect(table.header).toEqual(["Name", "Email"]);
    expect(table.hadInstructionRow).toBe(true);
    expect(table.rows).toEqual([
      { rowNumber: 3, cells: ["Ana", "ana@example.com"] },
      { rowNumber: 4, cells: ["", ""] },
      { rowNumber: 5, cells: ["Bruno", "bruno@example.com"] },
    ]);
  });

  it("tolerates ragged rows and quoted fields", () => {
    const table = readCsv('Name,Address\n"Acme, Inc","Main St, 1"\nGlobex\n');
    expect(table.hadInstructionRow).toBe(false);
    expect(table.rows).toEqual([
      { rowNumber: 2, cells: ["Acme, Inc", "Main St, 1"] },
      { rowNumber: 3, cells: ["Globex"] },
    ]);
  });

  it("returns nothing for an empty file", () => {
    expect(readCsv("")).toEqual({ header: [], rows: [], hadInstructionRow: false });
  });
});

describe("writeCsv", () => {
  it("quotes delimiters and quotes", () => {
    expect(writeCsv([["a", "b,c"], ["x", 'y"z']])).toBe('a,"b,c"\nx,"y""z"\n');
  });
});
