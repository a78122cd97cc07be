export type UpdateMode = "ctc" | "log";

export type CtcSummaryRow = {
  camp: string;
  calls: number;
  connects: number;
  ctc: number | null;
  abandoned: number;
};

export type LogSummaryRow = {
  camp: string;
  loggedCalls: number;
  recordingSeconds: number;
  dialTime: string;
};

export type ReportSummary =
  | { mode: "ctc"; rows: CtcSummaryRow[] }
  | { mode: "log"; rows: LogSummaryRow[] };

export function isUpdateMode(value: string): value is UpdateMode {
  return value === "ctc" || value === "log";
}

export function compareCamp(a: { camp: string }, b: { camp: string }): number {
  if (a.camp < b.camp) return -1;
  if (a.camp > b.camp) return 1;
  return 0;
}
