import { google } from "googleapis";
import type { ServiceAccountCredentials } from "../config/env";
import { TransportError } from "../lib/errors";
import {
  DEFAULT_RETRY_DELAYS_MS,
  formatRetryError,
  isTransientGoogleError,
  retryAsync,
  type RetryOptions,
} from "../lib/retry";
import { parseAliasTable } from "./resolveAliases";
import type { AliasTable, CellValue, SheetGrid, SheetStore } from "./types";

const SHEETS_SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

export interface SheetValuesClient {
  getValues(range: string): Promise<unknown[][]>;
  updateValue(range: string, value: CellValue): Promise<void>;
}

export type GoogleSheetStoreOptions = {
  client: SheetValuesClient;
  settingsSheetName: string;
  retries?: number;
  delaysMs?: number[];
  onRetry?: RetryOptions["onRetry"];
};

export function columnToLetters(col: number): string {
  if (!Number.isInteger(col) || col < 1) {
    throw new RangeError(`Column must be a positive integer, got ${col}`);
  }
  let letters = "";
  let remaining = col;
  while (remaining > 0) {
    const rem = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

export function cellRange(sheetName: string, row: number, col: number): string {
  return `${quoteSheetName(sheetName)}!${columnToLetters(col)}${row}`;
}

export function createSheetValuesClient(
  credentials: ServiceAccountCredentials,
  spreadsheetId: string
): SheetValuesClient {
  const auth = new google.auth.GoogleAuth({ credentials, scopes: SHEETS_SCOPES });
  const sheets = google.sheets({ version: "v4", auth });

  return {
    async getValues(range) {
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
      return res.data.values ?? [];
    },
    async updateValue(range, value) {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: "USER_ENTERED",
        requestBody: { values: [[value]] },
      });
    },
  };
}

export function createGoogleSheetStore(options: GoogleSheetStoreOptions): SheetStore {
  const { client, settingsSheetName } = options;
  const retryOptions: RetryOptions = {
    retries: options.retries ?? 3,
    delaysMs: options.delaysMs ?? DEFAULT_RETRY_DELAYS_MS,
    shouldRetry: isTransientGoogleError,
    onRetry: options.onRetry,
  };

  async function call<T>(description: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryAsync(fn, retryOptions);
    } catch (err) {
      throw new TransportError(`${description} failed: ${formatRetryError(err)}`, err);
    }
  }

  async function readSheet(name: string): Promise<SheetGrid> {
    const values = await call(`Reading sheet "${name}"`, () => client.getValues(quoteSheetName(name)));
    return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
  }

  async function readAliasTable(): Promise<AliasTable> {
    return parseAliasTable(await readSheet(settingsSheetName));
  }

  async function writeCell(sheetName: string, row: number, col: number, value: CellValue): Promise<void> {
    const range = cellRange(sheetName, row, col);
    await call(`Writing ${range}`, () => client.updateValue(range, value));
  }

  return { readSheet, readAliasTable, writeCell };
}
