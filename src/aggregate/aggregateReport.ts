import type { ReportTable } from "../report/readReportTable";
import { aggregateCtcReport } from "./aggregateCtcReport";
import { aggregateLogReport } from "./aggregateLogReport";
import type { ReportSummary, UpdateMode } from "./types";

export function aggregateReport(mode: UpdateMode, table: ReportTable): ReportSummary {
  if (mode === "ctc") {
    return { mode, rows: aggregateCtcReport(table) };
  }
  return { mode, rows: aggregateLogReport(table) };
}

export function summaryPreview(summary: ReportSummary, limit = 5): Record<string, string | number | null>[] {
  if (summary.mode === "ctc") {
    return summary.rows.slice(0, limit).map((row) => ({
      Camp: row.camp,
      Calls: row.calls,
      Connects: row.connects,
      CTC: row.ctc,
      Abandoned: row.abandoned,
    }));
  }
  return summary.rows.slice(0, limit).map((row) => ({
    Camp: row.camp,
    "Logged Calls": row.loggedCalls,
    "Dial Time": row.dialTime,
  }));
}
