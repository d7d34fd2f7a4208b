import {
  buildDetailReport,
  formatDetailReport,
  resolveReportFilename,
  serializeCsvReport,
  toReportRows,
  type CollectResult,
  type ExportTarget,
} from "@pltools/core/report";
import { writeCsvReport } from "../export.js";
import type { CommandContext } from "./context.js";

/**
 * Prints the per-list detail of an audit or search run and writes the CSV
 * report when one was requested.
 */
export async function reportMatches(
  context: CommandContext,
  command: "audit" | "search",
  exportTarget: ExportTarget,
  result: CollectResult,
): Promise<void> {
  const { logger, print } = context;
  const report = buildDetailReport(result.matches);

  if (report.sections.length === 0) {
    print("No matching entries found.");
  }
  for (const line of formatDetailReport(report)) {
    print(line);
  }
  logger.info(
    {
      lists: report.sections.length,
      entries: report.totalMatches,
      skippedLists: result.diagnostics.length,
    },
    "Report complete",
  );
  if (result.diagnostics.length > 0) {
    logger.warn(
      { listIds: result.diagnostics.map((d) => d.listId) },
      `${result.diagnostics.length} prefix lists could not be read and were skipped`,
    );
  }

  const filename = resolveReportFilename(
    exportTarget,
    command,
    context.startedAt,
  );
  if (filename !== null) {
    await writeCsvReport({
      reportsDir: context.config.output.reportsDir,
      filename,
      content: serializeCsvReport(toReportRows(result.matches), "detail"),
      logger,
    });
  }
}
