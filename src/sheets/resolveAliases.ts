import { ConfigError } from "../lib/errors";
import type { AliasTable, SheetGrid } from "./types";

export const ALIAS_KEY_COLUMN = "Camp";

function uniqueNonBlank(cells: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const cell of cells) {
    if (!cell || seen.has(cell)) continue;
    seen.add(cell);
    out.push(cell);
  }
  return out;
}

/**
 * Reads the settings worksheet into an alias table. The first row is the
 * header and must start with `Camp`.
 */
export function parseAliasTable(grid: SheetGrid): AliasTable {
  const columns = (grid[0] ?? []).map((cell) => String(cell ?? "").trim());
  if (columns[0] !== ALIAS_KEY_COLUMN) {
    throw new ConfigError(
      `Alias settings sheet must have "${ALIAS_KEY_COLUMN}" as its first column header.`
    );
  }

  const width = Math.max(columns.length, ...grid.map((row) => row.length));
  const rows: string[][] = [];
  for (const raw of grid.slice(1)) {
    const row = Array.from({ length: width }, (_, idx) => String(raw[idx] ?? "").trim());
    if (row.every((cell) => !cell)) continue;
    rows.push(row);
  }
  return { columns, rows };
}

/**
 * Returns the alternate spellings known for `campaignName`.
 *
 * A canonical name (column 0) yields the rest of its row. Any other match
 * yields the whole row minus the name itself, so the canonical name comes
 * first. Columns are scanned left to right, each top to bottom, and the first
 * hit wins.
 */
export function resolveAliases(table: AliasTable, campaignName: string): string[] {
  const canonicalRow = table.rows.find((row) => row[0] === campaignName);
  if (canonicalRow) {
    return uniqueNonBlank(canonicalRow.slice(1));
  }

  const width = Math.max(0, ...table.rows.map((row) => row.length));
  for (let col = 1; col < width; col += 1) {
    const matched = table.rows.find((row) => row[col] === campaignName);
    if (matched) {
      return uniqueNonBlank(matched).filter((name) => name !== campaignName);
    }
  }
  return [];
}
