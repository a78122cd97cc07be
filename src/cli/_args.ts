import fs from "node:fs";
import { isUpdateMode, type UpdateMode } from "../aggregate/types";

const WEEKDAYS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"];

export function getArg(flag: string, argv: string[] = process.argv): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function hasFlag(flag: string, argv: string[] = process.argv): boolean {
  return argv.includes(flag);
}

// The report reader also takes CSV text, so a mistyped path must be caught here.
export function isReportFile(file: string): boolean {
  return fs.existsSync(file) && fs.statSync(file).isFile();
}

export function parseMode(raw: string | undefined): UpdateMode | null {
  const value = (raw ?? "").trim().toLowerCase();
  return isUpdateMode(value) ? value : null;
}

/** Weekday 1-7 (Monday = 1) or an English day name -> zero-based day index. */
export function parseDayIndex(raw: string | undefined): number | null {
  const value = (raw ?? "").trim().toLowerCase();
  if (!value) return null;
  if (/^\d+$/.test(value)) {
    const day = Number.parseInt(value, 10);
    return day >= 1 && day <= WEEKDAYS.length ? day - 1 : null;
  }
  if (value.length < 3) return null;
  const idx = WEEKDAYS.findIndex((name) => name.startsWith(value));
  return idx === -1 ? null : idx;
}
