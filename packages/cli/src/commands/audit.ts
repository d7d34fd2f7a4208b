import { filterOversizedEntries } from "@pltools/core/filters";
import { collectMatches } from "@pltools/core/report";
import type { AuditCommand } from "../args.js";
import type { CommandContext } from "./context.js";
import { resolvePrefixLists } from "./scope.js";
import { reportMatches } from "./report.js";

export async function runAudit(
  context: CommandContext,
  command: AuditCommand,
): Promise<void> {
  const { logger } = context;
  const maxPrefixLength =
    command.maxPrefixLength ?? context.config.audit.maxPrefixLength;
  logger.info({ maxPrefixLength }, "Auditing prefix lists by CIDR size");

  const lists = await resolvePrefixLists(context, command.options);
  const result = await collectMatches(
    context.source,
    lists,
    (entries, list) =>
      filterOversizedEntries(
        entries,
        { maxPrefixLength },
        logger.child({ listId: list.id }),
      ),
    logger,
  );

  await reportMatches(context, "audit", command.options.exportTarget, result);
}
