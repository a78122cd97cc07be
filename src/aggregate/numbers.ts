import { FormatError } from "../lib/errors";

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

type NumberCellContext = {
  column: string;
  line: number;
};

function parseNumberCell(value: string, ctx: NumberCellContext): number | null {
  const raw = value.trim();
  if (!raw) return null;
  const cleaned = raw.replace(/,/g, "");
  const num = DECIMAL_RE.test(cleaned) ? Number(cleaned) : Number.NaN;
  if (!Number.isFinite(num)) {
    throw new FormatError(`Invalid number "${raw}" in column "${ctx.column}" (line ${ctx.line}).`);
  }
  return num;
}

export function parseFloatCell(value: string, ctx: NumberCellContext): number | null {
  return parseNumberCell(value, ctx);
}

export function parseIntCell(value: string, ctx: NumberCellContext): number | null {
  const num = parseNumberCell(value, ctx);
  if (num === null) return null;
  if (!Number.isInteger(num)) {
    throw new FormatError(`Expected an integer in column "${ctx.column}" (line ${ctx.line}), got "${value.trim()}".`);
  }
  return num;
}
