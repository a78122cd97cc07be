import type { CtcSummaryRow, LogSummaryRow, ReportSummary } from "../aggregate/types";
import type { CellValue } from "../sheets/types";

export const CTC_METRIC_LABELS = ["Calls", "Connects", "CTC", "Abandoned"] as const;
export const LOG_METRIC_LABELS = ["Logged Calls", "Dial Time"] as const;

export type MetricLabel = (typeof CTC_METRIC_LABELS)[number] | (typeof LOG_METRIC_LABELS)[number];

export type CampaignMetrics = {
  camp: string;
  values: Map<MetricLabel, CellValue>;
};

function ctcMetrics(row: CtcSummaryRow): CampaignMetrics {
  return {
    camp: row.camp,
    values: new Map<MetricLabel, CellValue>([
      ["Calls", row.calls],
      ["Connects", row.connects],
      ["CTC", row.ctc ?? ""],
      ["Abandoned", row.abandoned],
    ]),
  };
}

function logMetrics(row: LogSummaryRow): CampaignMetrics {
  return {
    camp: row.camp,
    values: new Map<MetricLabel, CellValue>([
      ["Logged Calls", row.loggedCalls],
      ["Dial Time", row.dialTime],
    ]),
  };
}

export function metricLabelsFor(summary: ReportSummary): readonly MetricLabel[] {
  return summary.mode === "ctc" ? CTC_METRIC_LABELS : LOG_METRIC_LABELS;
}

export function campaignMetrics(summary: ReportSummary): CampaignMetrics[] {
  if (summary.mode === "ctc") return summary.rows.map(ctcMetrics);
  return summary.rows.map(logMetrics);
}
