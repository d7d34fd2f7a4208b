import type { Logger } from "pino";
import {
  NOT_AVAILABLE,
  type Entry,
  type ListMatches,
  type PrefixList,
  type ReportRow,
} from "../schemas/prefix-list.js";
import type { PrefixListSource } from "../source/interface.js";
import { EntryFetchError } from "../errors/catalog.js";
import { displayName } from "../filters/names.js";

/** Narrows one list's entries to those that satisfy the active criterion. */
export type EntrySelector = (entries: Entry[], list: PrefixList) => Entry[];

export interface Diagnostic {
  errorCode: string;
  listId: string;
  message: string;
}

export interface CollectResult {
  /** Every processed list in fetch order, including those with no matches. */
  matches: ListMatches[];
  diagnostics: Diagnostic[];
}

export interface DetailEntry {
  block: string;
  description: string;
}

export interface DetailSection {
  listId: string;
  listName: string;
  count: number;
  entries: DetailEntry[];
}

export interface DetailReport {
  sections: DetailSection[];
  totalMatches: number;
}

/**
 * Maps list id to name, ordered by name (case-insensitive). Lists with equal
 * names keep their fetch order.
 */
export function buildListing(lists: PrefixList[]): Map<string, string> {
  const sorted = lists
    .map((list) => ({ id: list.id, name: displayName(list) }))
    .sort((a, b) => {
      const left = a.name.toLowerCase();
      const right = b.name.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    });

  return new Map(sorted.map(({ id, name }) => [id, name]));
}

/**
 * Fetches and narrows each list's entries, one list at a time. A list whose
 * entries cannot be fetched contributes nothing and is recorded as a
 * diagnostic; the remaining lists are still processed.
 */
export async function collectMatches(
  source: PrefixListSource,
  lists: PrefixList[],
  select: EntrySelector,
  logger?: Logger,
): Promise<CollectResult> {
  const matches: ListMatches[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const list of lists) {
    let entries: Entry[];
    try {
      entries = await source.getPrefixListEntries(list.id);
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      const failure = new EntryFetchError(list.id, cause);
      logger?.error(
        { listId: list.id, errorCode: failure.errorCode },
        failure.message,
      );
      diagnostics.push({
        errorCode: failure.errorCode,
        listId: list.id,
        message: failure.message,
      });
      entries = [];
    }

    const selected = select(entries, list);
    logger?.debug(
      { listId: list.id, fetched: entries.length, matched: selected.length },
      "Processed prefix list",
    );
    matches.push({ list, entries: selected });
  }

  return { matches, diagnostics };
}

/** Per-list detail in fetch order; lists without matches are omitted. */
export function buildDetailReport(matches: ListMatches[]): DetailReport {
  const sections = matches
    .filter(({ entries }) => entries.length > 0)
    .map(({ list, entries }) => ({
      listId: list.id,
      listName: displayName(list),
      count: entries.length,
      entries: entries.map((entry) => ({
        block: entry.block ?? NOT_AVAILABLE,
        description: entry.description ?? NOT_AVAILABLE,
      })),
    }));

  return {
    sections,
    totalMatches: sections.reduce((sum, section) => sum + section.count, 0),
  };
}

/** One row per (list, entry) pair, missing fields as "N/A". */
export function toReportRows(matches: ListMatches[]): ReportRow[] {
  return matches.flatMap(({ list, entries }) =>
    entries.map((entry) => ({
      listId: list.id,
      listName: displayName(list),
      block: entry.block ?? NOT_AVAILABLE,
      description: entry.description ?? NOT_AVAILABLE,
    })),
  );
}

/** One row per listed prefix list, with blank block and description. */
export function listingRows(listing: Map<string, string>): ReportRow[] {
  return [...listing].map(([listId, listName]) => ({
    listId,
    listName,
    block: "",
    description: "",
  }));
}
