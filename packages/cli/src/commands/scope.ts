import { selectPrefixLists } from "@pltools/core/filters";
import { NoPrefixListsError, SetupError } from "@pltools/core/errors";
import type { PrefixList } from "@pltools/core/schemas";
import type { CommonOptions } from "../args.js";
import type { CommandContext } from "./context.js";

function causeOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolves the caller's account and returns the customer-managed prefix
 * lists that pass the name filters, in fetch order.
 */
export async function resolvePrefixLists(
  context: CommandContext,
  options: CommonOptions,
): Promise<PrefixList[]> {
  const { source, logger } = context;

  let accountId: string;
  try {
    accountId = await source.getCallerAccountId();
  } catch (err) {
    throw new SetupError("Failed to get AWS account ID", {
      cause: causeOf(err),
    });
  }

  let lists: PrefixList[];
  try {
    lists = await source.listPrefixLists();
  } catch (err) {
    throw new SetupError("Failed to retrieve managed prefix lists", {
      cause: causeOf(err),
    });
  }

  const selected = selectPrefixLists(lists, {
    ownerId: accountId,
    nameInclude: options.nameInclude,
    nameExclude: options.nameExclude,
  });
  logger.info(
    { accountId, total: lists.length, selected: selected.length },
    "Selected customer-managed prefix lists",
  );

  if (selected.length === 0) {
    throw new NoPrefixListsError({
      accountId,
      ...(options.nameInclude !== undefined && {
        nameInclude: options.nameInclude,
      }),
      ...(options.nameExclude !== undefined && {
        nameExclude: options.nameExclude,
      }),
    });
  }
  return selected;
}
