import { resolveAliases } from "./resolveAliases";
import { FIRST_DATA_ROW_INDEX, type AliasTable, type SheetGrid } from "./types";

export type RowMatch =
  | { status: "found"; row: number; matchedName: string; viaAlias: boolean }
  | { status: "not_found" };

/** 1-based sheet row of the first data row whose first cell is `name`. */
export function findRow(grid: SheetGrid, name: string): number | null {
  for (let i = FIRST_DATA_ROW_INDEX; i < grid.length; i += 1) {
    const first = String(grid[i]?.[0] ?? "").trim();
    if (first === name) return i + 1;
  }
  return null;
}

// Aliases are only consulted when the name itself is absent from the sheet.
export function matchCampaignRow(grid: SheetGrid, name: string, aliasTable: AliasTable): RowMatch {
  const direct = findRow(grid, name);
  if (direct !== null) {
    return { status: "found", row: direct, matchedName: name, viaAlias: false };
  }
  for (const alias of resolveAliases(aliasTable, name)) {
    const row = findRow(grid, alias);
    if (row !== null) {
      return { status: "found", row, matchedName: alias, viaAlias: true };
    }
  }
  return { status: "not_found" };
}
