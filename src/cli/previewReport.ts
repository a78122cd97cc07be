import { aggregateReport, summaryPreview } from "../aggregate/aggregateReport";
import { formatError } from "../lib/errors";
import { readReportTable } from "../report/readReportTable";
import { getArg, isReportFile, parseMode } from "./_args";

function usage() {
  console.error("usage: npm run preview:report -- --mode ctc|log --file <report.csv|xlsx> [--limit N]");
}

function main(): void {
  const mode = parseMode(getArg("--mode"));
  const file = getArg("--file");
  const limitRaw = getArg("--limit");
  const limit = limitRaw ? Number.parseInt(limitRaw, 10) : 5;

  if (!mode || !file || !Number.isFinite(limit) || limit < 1) {
    usage();
    process.exitCode = 1;
    return;
  }

  if (!isReportFile(file)) {
    console.error(`Report file not found: ${file}`);
    process.exitCode = 1;
    return;
  }

  try {
    const summary = aggregateReport(mode, readReportTable(file));
    console.log(`Report: ${file}`);
    console.log(`Mode: ${mode}, campaigns: ${summary.rows.length}`);
    console.table(summaryPreview(summary, limit));
  } catch (error) {
    console.error(`preview failed: ${formatError(error)}`);
    process.exitCode = 1;
  }
}

main();
