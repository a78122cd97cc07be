import { cellAt, requireColumns, type ReportTable } from "../report/readReportTable";
import { FormatError } from "../lib/errors";
import { parseIntCell } from "./numbers";
import { compareCamp, type LogSummaryRow } from "./types";

export const LOG_REPORT_COLUMNS = ["Current campaign", "Recording Length (Seconds)"] as const;

export type LogRecord = {
  camp: string;
  recordingSeconds: number;
};

// Hours are not wrapped at 24: 90000 -> "25:00:00".
export function formatDialTime(totalSeconds: number): string {
  if (!Number.isInteger(totalSeconds) || totalSeconds < 0) {
    throw new RangeError(`Dial time needs a non-negative whole number of seconds, got ${totalSeconds}`);
  }
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

export function parseLogRecords(table: ReportTable): LogRecord[] {
  const columns = requireColumns(table, LOG_REPORT_COLUMNS);
  const records: LogRecord[] = [];

  for (let i = 0; i < table.rows.length; i += 1) {
    const row = table.rows[i] ?? [];
    const camp = cellAt(row, columns["Current campaign"]);
    const lengthRaw = cellAt(row, columns["Recording Length (Seconds)"]);
    if (!camp || !lengthRaw) continue;

    const recordingSeconds = parseIntCell(lengthRaw, {
      column: "Recording Length (Seconds)",
      line: i + 2,
    });
    if (recordingSeconds === null) continue;
    if (recordingSeconds < 0) {
      throw new FormatError(
        `Negative recording length "${lengthRaw}" in column "Recording Length (Seconds)" (line ${i + 2}).`
      );
    }
    records.push({ camp, recordingSeconds });
  }

  return records;
}

export function summarizeLogRecords(records: LogRecord[]): LogSummaryRow[] {
  const byCamp = new Map<string, { seconds: number; count: number }>();
  for (const record of records) {
    const acc = byCamp.get(record.camp) ?? { seconds: 0, count: 0 };
    acc.seconds += record.recordingSeconds;
    acc.count += 1;
    byCamp.set(record.camp, acc);
  }

  return Array.from(byCamp.entries())
    .map(([camp, acc]) => ({
      camp,
      loggedCalls: acc.count,
      recordingSeconds: acc.seconds,
      dialTime: formatDialTime(acc.seconds),
    }))
    .sort(compareCamp);
}

export function aggregateLogReport(table: ReportTable): LogSummaryRow[] {
  return summarizeLogRecords(parseLogRecords(table));
}
