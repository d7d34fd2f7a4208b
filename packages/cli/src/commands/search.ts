import { searchEntries } from "@pltools/core/filters";
import { collectMatches } from "@pltools/core/report";
import type { SearchCommand } from "../args.js";
import type { CommandContext } from "./context.js";
import { resolvePrefixLists } from "./scope.js";
import { reportMatches } from "./report.js";

export async function runSearch(
  context: CommandContext,
  command: SearchCommand,
): Promise<void> {
  const { logger } = context;
  logger.info(
    { field: command.criteria.field, term: command.criteria.term },
    "Searching prefix list entries",
  );

  const lists = await resolvePrefixLists(context, command.options);
  const result = await collectMatches(
    context.source,
    lists,
    (entries) => searchEntries(entries, command.criteria),
    logger,
  );

  await reportMatches(context, "search", command.options.exportTarget, result);
}
