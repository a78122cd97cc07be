import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { FormatError } from "../lib/errors";

export type ReportTable = {
  headers: string[];
  rows: string[][];
};

const WORKBOOK_EXT_RE = /\.xlsx?$/i;

export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];
    if (char === '"') {
      if (inQuotes && content[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      current.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && content[i + 1] === "\n") {
        i += 1;
      }
      current.push(field);
      field = "";
      if (current.length > 1 || current[0]?.trim()) {
        rows.push(current);
      }
      current = [];
      continue;
    }

    field += char;
  }

  if (field.length || current.length) {
    current.push(field);
    if (current.length > 1 || current[0]?.trim()) rows.push(current);
  }

  return rows;
}

function readWorkbookRows(filePath: string): string[][] {
  const workbook = XLSX.readFile(filePath, { dense: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return [];
  const rows = XLSX.utils.sheet_to_json<(string | number | boolean | null)[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false,
  });
  return rows.map((row) => row.map((cell) => String(cell ?? "")));
}

function toTable(rows: string[][]): ReportTable {
  if (!rows.length) return { headers: [], rows: [] };
  const headers = (rows[0] ?? []).map((cell, idx) =>
    (idx === 0 ? cell.replace(/^\uFEFF/, "") : cell).trim()
  );
  return { headers, rows: rows.slice(1) };
}

/**
 * Reads a report from a CSV or workbook path, or from CSV text when `input`
 * is not an existing file.
 */
export function readReportTable(input: string): ReportTable {
  if (fs.existsSync(input) && fs.statSync(input).isFile()) {
    if (WORKBOOK_EXT_RE.test(path.extname(input))) {
      return toTable(readWorkbookRows(input));
    }
    return toTable(parseCsv(fs.readFileSync(input, "utf8")));
  }
  return toTable(parseCsv(input));
}

export function requireColumns(table: ReportTable, names: readonly string[]): Record<string, number> {
  const indexMap: Record<string, number> = {};
  const missing: string[] = [];
  for (const name of names) {
    const idx = table.headers.indexOf(name);
    if (idx === -1) {
      missing.push(name);
      continue;
    }
    indexMap[name] = idx;
  }
  if (missing.length) {
    throw new FormatError(`Report is missing required column(s): ${missing.join(", ")}`);
  }
  return indexMap;
}

export function cellAt(row: string[], index: number): string {
  return (row[index] ?? "").trim();
}
