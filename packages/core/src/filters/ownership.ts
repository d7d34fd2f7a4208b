import type { FilterCriteria, PrefixList } from "../schemas/prefix-list.js";
import { filterByName } from "./names.js";

/**
 * Restricts lists to those owned by `ownerId` (exact match). Without an
 * owner every list is returned.
 */
export function filterByOwner(
  lists: PrefixList[],
  ownerId?: string,
): PrefixList[] {
  if (!ownerId) {
    return lists;
  }
  return lists.filter((list) => list.owner === ownerId);
}

/** Applies ownership, then name include/exclude filtering. */
export function selectPrefixLists(
  lists: PrefixList[],
  criteria: FilterCriteria,
): PrefixList[] {
  return filterByName(filterByOwner(lists, criteria.ownerId), criteria);
}
