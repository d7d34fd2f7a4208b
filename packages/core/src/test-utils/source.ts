/**
 * In-memory PrefixListSource for tests. Unknown list ids reject the way the
 * EC2 API does for a deleted prefix list.
 */

import type { Entry, PrefixList } from "../schemas/prefix-list.js";
import type { PrefixListSource } from "../source/interface.js";

export interface InMemorySourceData {
  accountId: string;
  lists: PrefixList[];
  entries: Record<string, Entry[]>;
}

export interface InMemorySource extends PrefixListSource {
  /** List ids passed to getPrefixListEntries, in call order. */
  readonly fetched: string[];
}

export class PrefixListNotFoundError extends Error {
  constructor(listId: string) {
    super(`The prefix list ID '${listId}' does not exist`);
    this.name = "InvalidPrefixListID.NotFound";
  }
}

export function createInMemorySource(data: InMemorySourceData): InMemorySource {
  const fetched: string[] = [];

  return {
    fetched,
    async listPrefixLists() {
      return [...data.lists];
    },
    async getPrefixListEntries(listId: string) {
      fetched.push(listId);
      const entries = data.entries[listId];
      if (!entries) {
        throw new PrefixListNotFoundError(listId);
      }
      return [...entries];
    },
    async getCallerAccountId() {
      return data.accountId;
    },
  };
}
