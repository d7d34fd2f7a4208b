import type { Entry, PrefixList } from "../schemas/prefix-list.js";

/**
 * Read-only access to the managed prefix lists visible to the caller's
 * credentials.
 */
export interface PrefixListSource {
  /** Enumerate every prefix list, in the order the provider returns them. */
  listPrefixLists(): Promise<PrefixList[]>;

  /**
   * Fetch the entries of one prefix list.
   * @throws if the list does not exist or cannot be read
   */
  getPrefixListEntries(listId: string): Promise<Entry[]>;

  /** Account identifier of the caller, used for ownership filtering. */
  getCallerAccountId(): Promise<string>;
}
