import {
  NOT_AVAILABLE,
  type FilterCriteria,
  type PrefixList,
} from "../schemas/prefix-list.js";

export type NameCriteria = Pick<FilterCriteria, "nameInclude" | "nameExclude">;

export function displayName(list: PrefixList): string {
  return list.name ?? NOT_AVAILABLE;
}

/**
 * Keeps lists whose name contains `nameInclude` and does not contain
 * `nameExclude`, both case-insensitive. Input order is preserved.
 */
export function filterByName(
  lists: PrefixList[],
  criteria: NameCriteria,
): PrefixList[] {
  const include = criteria.nameInclude?.toLowerCase();
  const exclude = criteria.nameExclude?.toLowerCase();

  return lists.filter((list) => {
    const name = displayName(list).toLowerCase();
    if (include && !name.includes(include)) {
      return false;
    }
    if (exclude && name.includes(exclude)) {
      return false;
    }
    return true;
  });
}
