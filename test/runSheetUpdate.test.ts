import { describe, it, expect } from "vitest";
import type { ReportSummary } from "../src/aggregate/types";
import { ColumnResolutionError, TransportError } from "../src/lib/errors";
import { runSheetUpdate, type RunMessage } from "../src/update/runSheetUpdate";
import { MemorySheetStore } from "./utils/memorySheetStore";

const CTC_HEADER = ["Camp", "Calls", "Connects", "CTC", "Abandoned", "Calls", "Connects", "CTC", "Abandoned"];

function makeStore(): MemorySheetStore {
  const grid = [
    ["Week 12"],
    CTC_HEADER,
    ["Camp A", "", "", "", "", "", "", "", ""],
    ["Camp Y", "", "", "", "", "", "", "", ""],
  ];
  const aliases = [
    ["Camp", "Alias"],
    ["Camp Y", "Camp X"],
  ];
  return new MemorySheetStore(new Map([["Daily", grid]]), aliases);
}

const ctcSummary: ReportSummary = {
  mode: "ctc",
  rows: [
    { camp: "Camp A", calls: 30, connects: 15, ctc: 55, abandoned: 3 },
    { camp: "Camp X", calls: 5, connects: 2, ctc: 40, abandoned: 0 },
    { camp: "Ghost", calls: 1, connects: 1, ctc: null, abandoned: 0 },
  ],
};

describe("runSheetUpdate", () => {
  it("writes each metric to the day's column for matched campaigns", async () => {
    const store = makeStore();
    const result = await runSheetUpdate({ store, sheetName: "Daily", dayIndex: 1, summary: ctcSummary });

    expect(store.writes).toEqual([
      { sheetName: "Daily", row: 3, col: 6, value: 30 },
      { sheetName: "Daily", row: 3, col: 7, value: 15 },
      { sheetName: "Daily", row: 3, col: 8, value: 55 },
      { sheetName: "Daily", row: 3, col: 9, value: 3 },
      { sheetName: "Daily", row: 4, col: 6, value: 5 },
      { sheetName: "Daily", row: 4, col: 7, value: 2 },
      { sheetName: "Daily", row: 4, col: 8, value: 40 },
      { sheetName: "Daily", row: 4, col: 9, value: 0 },
    ]);
    expect(result.writes).toEqual(store.writes);
    expect(result.updated).toEqual(["Camp A", "Camp X"]);
    expect(result.missing).toEqual(["Ghost"]);
    expect(result.messages).toEqual([
      { level: "success", camp: "Camp A", text: "Updated Camp A on day 2 with targets." },
      { level: "info", camp: "Camp X", text: "Using alternate name 'Camp Y' for campaign 'Camp X'." },
      { level: "success", camp: "Camp X", text: "Updated Camp X on day 2 with targets." },
      {
        level: "warning",
        camp: "Ghost",
        text: "Camp name 'Ghost' and its alternatives not found in the sheet.",
      },
    ]);
  });

  it("writes Log mode metrics and leaves unresolved CTC values blank", async () => {
    const grid = [
      ["Title"],
      ["Camp", "Logged Calls", "Dial Time"],
      ["Alpha", "", ""],
    ];
    const store = new MemorySheetStore(new Map([["Log", grid]]));
    await runSheetUpdate({
      store,
      sheetName: "Log",
      dayIndex: 0,
      summary: {
        mode: "log",
        rows: [{ camp: "Alpha", loggedCalls: 2, recordingSeconds: 3661, dialTime: "01:01:01" }],
      },
    });
    expect(store.writes).toEqual([
      { sheetName: "Log", row: 3, col: 2, value: 2 },
      { sheetName: "Log", row: 3, col: 3, value: "01:01:01" },
    ]);

    const ctcStore = makeStore();
    const result = await runSheetUpdate({
      store: ctcStore,
      sheetName: "Daily",
      dayIndex: 0,
      summary: { mode: "ctc", rows: [{ camp: "Camp A", calls: 1, connects: 0, ctc: null, abandoned: 0 }] },
    });
    expect(result.writes[2]).toEqual({ sheetName: "Daily", row: 3, col: 4, value: "" });
  });

  it("aborts before any write when a column is missing for the day", async () => {
    const store = makeStore();
    const run = runSheetUpdate({ store, sheetName: "Daily", dayIndex: 2, summary: ctcSummary });
    await expect(run).rejects.toBeInstanceOf(ColumnResolutionError);
    await expect(run).rejects.toThrow(
      "Invalid day index for one or more columns (Calls, Connects, CTC, Abandoned on day 3). Please check the sheet headers."
    );
    expect(store.writes).toEqual([]);
  });

  it("does nothing for an empty summary", async () => {
    const store = makeStore();
    const result = await runSheetUpdate({
      store,
      sheetName: "Daily",
      dayIndex: 0,
      summary: { mode: "log", rows: [] },
    });
    expect(store.reads).toBe(0);
    expect(result.writes).toEqual([]);
    expect(result.messages).toEqual([{ level: "info", camp: null, text: "No campaign rows to update." }]);
  });

  it("plans writes without issuing them on a dry run", async () => {
    const store = makeStore();
    const result = await runSheetUpdate({
      store,
      sheetName: "Daily",
      dayIndex: 1,
      summary: ctcSummary,
      dryRun: true,
    });
    expect(store.writes).toEqual([]);
    expect(result.writes.length).toBe(8);
    expect(result.writes[0]).toEqual({ sheetName: "Daily", row: 3, col: 6, value: 30 });
  });

  it("issues identical writes when run twice", async () => {
    const store = makeStore();
    const first = await runSheetUpdate({ store, sheetName: "Daily", dayIndex: 1, summary: ctcSummary });
    const second = await runSheetUpdate({ store, sheetName: "Daily", dayIndex: 1, summary: ctcSummary });
    expect(second.writes).toEqual(first.writes);
    expect(second.messages).toEqual(first.messages);
  });

  it("keeps earlier writes when a later write fails", async () => {
    const store = makeStore();
    store.failOnWrite = 6;
    await expect(
      runSheetUpdate({ store, sheetName: "Daily", dayIndex: 1, summary: ctcSummary })
    ).rejects.toBeInstanceOf(TransportError);
    expect(store.writes.length).toBe(5);
    expect(store.writes[4]).toEqual({ sheetName: "Daily", row: 4, col: 6, value: 5 });
  });

  it("reports messages as they happen so a failed run still shows finished campaigns", async () => {
    const store = makeStore();
    store.failOnWrite = 6;
    const received: RunMessage[] = [];
    await expect(
      runSheetUpdate({
        store,
        sheetName: "Daily",
        dayIndex: 1,
        summary: ctcSummary,
        onMessage: (message) => received.push(message),
      })
    ).rejects.toBeInstanceOf(TransportError);
    expect(received).toEqual([
      { level: "success", camp: "Camp A", text: "Updated Camp A on day 2 with targets." },
      { level: "info", camp: "Camp X", text: "Using alternate name 'Camp Y' for campaign 'Camp X'." },
    ]);
  });

  it("passes every returned message to onMessage in order", async () => {
    const store = makeStore();
    const received: RunMessage[] = [];
    const result = await runSheetUpdate({
      store,
      sheetName: "Daily",
      dayIndex: 1,
      summary: ctcSummary,
      onMessage: (message) => received.push(message),
    });
    expect(received).toEqual(result.messages);
  });
});
