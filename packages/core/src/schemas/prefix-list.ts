import { z } from "zod";

/** Placeholder used wherever a list name or entry field is missing. */
export const NOT_AVAILABLE = "N/A";

export const PrefixListSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  owner: z.string().optional(),
});

export const EntrySchema = z.object({
  block: z.string().optional(),
  description: z.string().optional(),
});

export const ReportRowSchema = z.object({
  listId: z.string(),
  listName: z.string(),
  block: z.string(),
  description: z.string(),
});

export type PrefixList = z.infer<typeof PrefixListSchema>;
export type Entry = z.infer<typeof EntrySchema>;
export type ReportRow = z.infer<typeof ReportRowSchema>;

/** Criteria applied to prefix list records. Absent fields do not constrain. */
export interface FilterCriteria {
  nameInclude?: string;
  nameExclude?: string;
  ownerId?: string;
}

export type SearchField = "description" | "address";

export type SearchCriteria =
  | { field: "description"; term: string }
  | { field: "address"; term: string };

export interface SizeCriteria {
  /** Entries with a prefix length strictly below this value are oversized. */
  maxPrefixLength: number;
}

export const MaxPrefixLengthSchema = z.number().int().min(0).max(32);

/** A prefix list paired with the entries that passed the active criterion. */
export interface ListMatches {
  list: PrefixList;
  entries: Entry[];
}
