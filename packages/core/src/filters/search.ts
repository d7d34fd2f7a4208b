import type {
  Entry,
  SearchCriteria,
  SearchField,
} from "../schemas/prefix-list.js";

function fieldValue(entry: Entry, field: SearchField): string | undefined {
  return field === "description" ? entry.description : entry.block;
}

/**
 * Case-insensitive substring search over one entry field. Addresses are
 * matched as literal text, so "10.0" also matches "110.0.0.0/16".
 * Entries without the field never match.
 */
export function searchEntries(
  entries: Entry[],
  criteria: SearchCriteria,
): Entry[] {
  const term = criteria.term.toLowerCase();

  return entries.filter((entry) => {
    const value = fieldValue(entry, criteria.field);
    return value !== undefined && value.toLowerCase().includes(term);
  });
}
