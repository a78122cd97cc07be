import { config as loadEnv } from "dotenv";
import { ConfigError } from "../lib/errors";

loadEnv({ path: ".env.local" });

export const DEFAULT_SETTINGS_SHEET_NAME = "Settings";

export type ServiceAccountCredentials = {
  client_email: string;
  private_key: string;
};

export type UpdaterConfig = {
  credentials: ServiceAccountCredentials;
  spreadsheetId: string;
  settingsSheetName: string;
};

type EnvName = "GOOGLE_CREDENTIALS_JSON" | "SPREADSHEET_ID";

function requireEnv(env: NodeJS.ProcessEnv, name: EnvName): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`Missing ${name}. Put it in .env.local`);
  }
  return value;
}

export function parseCredentialsJson(raw: string): ServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("GOOGLE_CREDENTIALS_JSON is not valid JSON.");
  }
  if (!parsed || typeof parsed !== "object") {
    throw new ConfigError("GOOGLE_CREDENTIALS_JSON must be a JSON object.");
  }
  const clientEmail = "client_email" in parsed ? parsed.client_email : undefined;
  const privateKey = "private_key" in parsed ? parsed.private_key : undefined;
  if (typeof clientEmail !== "string" || !clientEmail) {
    throw new ConfigError("GOOGLE_CREDENTIALS_JSON is missing client_email.");
  }
  if (typeof privateKey !== "string" || !privateKey) {
    throw new ConfigError("GOOGLE_CREDENTIALS_JSON is missing private_key.");
  }
  // Keys pasted into a single-line env value carry literal "\n".
  return { client_email: clientEmail, private_key: privateKey.replace(/\\n/g, "\n") };
}

export function loadUpdaterConfig(
  overrides: { spreadsheetId?: string; settingsSheetName?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): UpdaterConfig {
  const credentials = parseCredentialsJson(requireEnv(env, "GOOGLE_CREDENTIALS_JSON"));
  const spreadsheetId = overrides.spreadsheetId?.trim() || requireEnv(env, "SPREADSHEET_ID");
  const settingsSheetName =
    overrides.settingsSheetName?.trim() ||
    env.SETTINGS_SHEET_NAME?.trim() ||
    DEFAULT_SETTINGS_SHEET_NAME;
  return { credentials, spreadsheetId, settingsSheetName };
}
