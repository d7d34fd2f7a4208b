import {
  buildListing,
  formatListing,
  listingRows,
  resolveReportFilename,
  serializeCsvReport,
} from "@pltools/core/report";
import type { ListCommand } from "../args.js";
import type { CommandContext } from "./context.js";
import { resolvePrefixLists } from "./scope.js";
import { writeCsvReport } from "../export.js";

export async function runList(
  context: CommandContext,
  command: ListCommand,
): Promise<void> {
  const { logger, print } = context;
  const lists = await resolvePrefixLists(context, command.options);
  const listing = buildListing(lists);

  for (const line of formatListing(listing)) {
    print(line);
  }
  logger.info({ lists: listing.size }, "Listing complete");

  const filename = resolveReportFilename(
    command.options.exportTarget,
    "list",
    context.startedAt,
  );
  if (filename !== null) {
    await writeCsvReport({
      reportsDir: context.config.output.reportsDir,
      filename,
      content: serializeCsvReport(listingRows(listing), "listing"),
      logger,
    });
  }
}
