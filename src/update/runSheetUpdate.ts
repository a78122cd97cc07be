import type { ReportSummary } from "../aggregate/types";
import { ColumnResolutionError } from "../lib/errors";
import { matchCampaignRow } from "../sheets/findRow";
import { resolveMetricColumns } from "../sheets/resolveColumn";
import { HEADER_ROW_INDEX, type CellValue, type SheetStore } from "../sheets/types";
import { campaignMetrics, metricLabelsFor } from "./metrics";

export type RunMessageLevel = "success" | "info" | "warning";

export type RunMessage = {
  level: RunMessageLevel;
  camp: string | null;
  text: string;
};

export type CellWrite = {
  sheetName: string;
  row: number;
  col: number;
  value: CellValue;
};

export type SheetUpdateResult = {
  writes: CellWrite[];
  updated: string[];
  missing: string[];
  messages: RunMessage[];
};

export type SheetUpdateOptions = {
  store: SheetStore;
  sheetName: string;
  dayIndex: number;
  summary: ReportSummary;
  dryRun?: boolean;
  // Called as each message is produced, before any later write can fail.
  onMessage?: (message: RunMessage) => void;
};

/**
 * Writes one report summary into the target sheet.
 *
 * Column resolution failures abort before any write. A campaign that matches
 * no sheet row (directly or through an alias) is reported as a warning and
 * skipped. Writes already issued are not rolled back when a later one fails.
 */
export async function runSheetUpdate(options: SheetUpdateOptions): Promise<SheetUpdateResult> {
  const { store, sheetName, dayIndex, summary, dryRun = false, onMessage } = options;
  const result: SheetUpdateResult = { writes: [], updated: [], missing: [], messages: [] };
  const campaigns = campaignMetrics(summary);

  function report(message: RunMessage) {
    result.messages.push(message);
    if (onMessage) onMessage(message);
  }

  if (!campaigns.length) {
    report({ level: "info", camp: null, text: "No campaign rows to update." });
    return result;
  }

  const grid = await store.readSheet(sheetName);
  const headerRow = grid[HEADER_ROW_INDEX] ?? [];
  const resolved = resolveMetricColumns(metricLabelsFor(summary), dayIndex, headerRow);
  if (resolved.status === "missing") {
    throw new ColumnResolutionError(resolved.labels, dayIndex);
  }

  const aliasTable = await store.readAliasTable();

  for (const campaign of campaigns) {
    const match = matchCampaignRow(grid, campaign.camp, aliasTable);
    if (match.status === "not_found") {
      result.missing.push(campaign.camp);
      report({
        level: "warning",
        camp: campaign.camp,
        text: `Camp name '${campaign.camp}' and its alternatives not found in the sheet.`,
      });
      continue;
    }

    if (match.viaAlias) {
      report({
        level: "info",
        camp: campaign.camp,
        text: `Using alternate name '${match.matchedName}' for campaign '${campaign.camp}'.`,
      });
    }

    for (const { label, column } of resolved.columns) {
      const value = campaign.values.get(label) ?? "";
      const write: CellWrite = { sheetName, row: match.row, col: column, value };
      if (!dryRun) {
        await store.writeCell(write.sheetName, write.row, write.col, write.value);
      }
      result.writes.push(write);
    }

    result.updated.push(campaign.camp);
    report({
      level: "success",
      camp: campaign.camp,
      text: `Updated ${campaign.camp} on day ${dayIndex + 1} with targets.`,
    });
  }

  return result;
}
