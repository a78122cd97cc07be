import { cellAt, requireColumns, type ReportTable } from "../report/readReportTable";
import { parseFloatCell, parseIntCell } from "./numbers";
import { compareCamp, type CtcSummaryRow } from "./types";

export const CTC_REPORT_COLUMNS = [
  "Campaign",
  "Calls",
  "Connects",
  "Calls to Connect",
  "Abandoned",
] as const;

export type CtcRecord = {
  camp: string;
  calls: number | null;
  connects: number | null;
  ctc: number | null;
  abandoned: number | null;
};

type CtcAccumulator = {
  calls: number;
  connects: number;
  abandoned: number;
  ctcTotal: number;
  ctcCount: number;
};

export function parseCtcRecords(table: ReportTable): CtcRecord[] {
  const columns = requireColumns(table, CTC_REPORT_COLUMNS);
  const records: CtcRecord[] = [];

  for (let i = 0; i < table.rows.length; i += 1) {
    const row = table.rows[i] ?? [];
    const camp = cellAt(row, columns["Campaign"]);
    if (!camp) continue;
    // Header is line 1.
    const line = i + 2;

    records.push({
      camp,
      calls: parseIntCell(cellAt(row, columns["Calls"]), { column: "Calls", line }),
      connects: parseIntCell(cellAt(row, columns["Connects"]), { column: "Connects", line }),
      ctc: parseFloatCell(cellAt(row, columns["Calls to Connect"]), { column: "Calls to Connect", line }),
      abandoned: parseIntCell(cellAt(row, columns["Abandoned"]), { column: "Abandoned", line }),
    });
  }

  return records;
}

export function summarizeCtcRecords(records: CtcRecord[]): CtcSummaryRow[] {
  const byCamp = new Map<string, CtcAccumulator>();
  for (const record of records) {
    const acc = byCamp.get(record.camp) ?? {
      calls: 0,
      connects: 0,
      abandoned: 0,
      ctcTotal: 0,
      ctcCount: 0,
    };
    acc.calls += record.calls ?? 0;
    acc.connects += record.connects ?? 0;
    acc.abandoned += record.abandoned ?? 0;
    if (record.ctc !== null) {
      acc.ctcTotal += record.ctc;
      acc.ctcCount += 1;
    }
    byCamp.set(record.camp, acc);
  }

  return Array.from(byCamp.entries())
    .map(([camp, acc]) => ({
      camp,
      calls: acc.calls,
      connects: acc.connects,
      ctc: acc.ctcCount ? acc.ctcTotal / acc.ctcCount : null,
      abandoned: acc.abandoned,
    }))
    .sort(compareCamp);
}

export function aggregateCtcReport(table: ReportTable): CtcSummaryRow[] {
  return summarizeCtcRecords(parseCtcRecords(table));
}
