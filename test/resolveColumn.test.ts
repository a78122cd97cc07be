import { describe, it, expect } from "vitest";
import { resolveColumn, resolveMetricColumns } from "../src/sheets/resolveColumn";

describe("resolveColumn", () => {
  const header = ["Calls", "CTC", "Calls", "CTC"];

  it("picks the occurrence matching the day index", () => {
    expect(resolveColumn("Calls", 1, header)).toBe(3);
    expect(resolveColumn("CTC", 1, header)).toBe(4);
    expect(resolveColumn("Calls", 0, header)).toBe(1);
  });

  it("is defined exactly for indexes below the occurrence count", () => {
    for (let k = 0; k <= 4; k += 1) {
      const row = Array.from({ length: k }, () => "Dial Time");
      for (let i = 0; i < k; i += 1) {
        expect(resolveColumn("Dial Time", i, row)).toBe(i + 1);
      }
      expect(resolveColumn("Dial Time", k, row)).toBeNull();
    }
  });

  it("trims header cells and compares case-sensitively", () => {
    const row = ["Camp", " Logged Calls ", "logged calls", "Logged Calls"];
    expect(resolveColumn("Logged Calls", 0, row)).toBe(2);
    expect(resolveColumn("Logged Calls", 1, row)).toBe(4);
  });

  it("rejects negative indexes", () => {
    expect(resolveColumn("Calls", -1, header)).toBeNull();
  });
});

describe("resolveMetricColumns", () => {
  it("returns columns in label order", () => {
    const result = resolveMetricColumns(["CTC", "Calls"], 1, ["Calls", "CTC", "Calls", "CTC"]);
    expect(result).toEqual({
      status: "ok",
      columns: [
        { label: "CTC", column: 4 },
        { label: "Calls", column: 3 },
      ],
    });
  });

  it("lists every label without enough occurrences", () => {
    const result = resolveMetricColumns(["Calls", "Connects", "CTC"], 1, ["Calls", "CTC", "Calls"]);
    expect(result).toEqual({ status: "missing", labels: ["Connects", "CTC"] });
  });
});
