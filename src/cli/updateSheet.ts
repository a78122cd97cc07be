import { aggregateReport, summaryPreview } from "../aggregate/aggregateReport";
import { loadUpdaterConfig } from "../config/env";
import { formatError } from "../lib/errors";
import { formatRetryError } from "../lib/retry";
import { readReportTable } from "../report/readReportTable";
import { createGoogleSheetStore, createSheetValuesClient } from "../sheets/googleSheetStore";
import { runSheetUpdate, type RunMessage } from "../update/runSheetUpdate";
import { getArg, hasFlag, isReportFile, parseDayIndex, parseMode } from "./_args";

function usage() {
  console.log(
    "Usage: npm run update:sheet -- --sheet <name> --mode ctc|log --day <1-7|weekday> --file <report.csv|xlsx> [--spreadsheet-id <id>] [--settings-sheet <name>] [--dry-run]"
  );
}

function printMessage(message: RunMessage) {
  if (message.level === "warning") {
    console.warn(`[warning] ${message.text}`);
    return;
  }
  console.log(`[${message.level}] ${message.text}`);
}

async function main() {
  const sheetName = getArg("--sheet");
  const mode = parseMode(getArg("--mode"));
  const dayIndex = parseDayIndex(getArg("--day"));
  const file = getArg("--file");
  const dryRun = hasFlag("--dry-run");

  if (!sheetName || !mode || dayIndex === null || !file) {
    usage();
    process.exitCode = 1;
    return;
  }

  if (!isReportFile(file)) {
    console.error(`Report file not found: ${file}`);
    usage();
    process.exitCode = 1;
    return;
  }

  const config = loadUpdaterConfig({
    spreadsheetId: getArg("--spreadsheet-id"),
    settingsSheetName: getArg("--settings-sheet"),
  });

  const summary = aggregateReport(mode, readReportTable(file));
  console.log(`Aggregated ${summary.rows.length} campaign(s). Preview:`);
  console.table(summaryPreview(summary));

  const store = createGoogleSheetStore({
    client: createSheetValuesClient(config.credentials, config.spreadsheetId),
    settingsSheetName: config.settingsSheetName,
    onRetry: ({ attempt, error, delayMs }) => {
      console.warn(`Retrying sheet call (attempt ${attempt}, ${delayMs}ms): ${formatRetryError(error)}`);
    },
  });

  const result = await runSheetUpdate({
    store,
    sheetName,
    dayIndex,
    summary,
    dryRun,
    onMessage: printMessage,
  });

  if (dryRun) {
    console.log("Dry run: no cells written. Planned writes:");
    console.table(result.writes);
  }
  console.log(
    `Done. updated=${result.updated.length} missing=${result.missing.length} cells=${result.writes.length}${dryRun ? " (dry run)" : ""}`
  );
}

main().catch((err) => {
  console.error(`An error occurred: ${formatError(err)}`);
  process.exitCode = 1;
});
