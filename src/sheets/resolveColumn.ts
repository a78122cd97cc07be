export type MetricColumn<L extends string> = {
  label: L;
  column: number;
};

export type MetricColumnsResult<L extends string> =
  | { status: "ok"; columns: MetricColumn<L>[] }
  | { status: "missing"; labels: L[] };

/**
 * Finds the 1-based column of the `occurrenceIndex`-th cell equal to `label`.
 * Header labels repeat once per weekday, so the occurrence is the day index.
 */
export function resolveColumn(label: string, occurrenceIndex: number, headerRow: readonly string[]): number | null {
  if (!Number.isInteger(occurrenceIndex) || occurrenceIndex < 0) return null;
  const occurrences: number[] = [];
  headerRow.forEach((cell, idx) => {
    if (String(cell ?? "").trim() === label) occurrences.push(idx);
  });
  const position = occurrences[occurrenceIndex];
  return position === undefined ? null : position + 1;
}

// Columns come back in `labels` order.
export function resolveMetricColumns<L extends string>(
  labels: readonly L[],
  dayIndex: number,
  headerRow: readonly string[]
): MetricColumnsResult<L> {
  const columns: MetricColumn<L>[] = [];
  const missing: L[] = [];
  for (const label of labels) {
    const column = resolveColumn(label, dayIndex, headerRow);
    if (column === null) {
      missing.push(label);
    } else {
      columns.push({ label, column });
    }
  }
  if (missing.length) return { status: "missing", labels: missing };
  return { status: "ok", columns };
}
