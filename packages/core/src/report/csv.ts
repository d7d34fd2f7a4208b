import { stringify } from "csv-stringify/sync";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { ReportRow } from "../schemas/prefix-list.js";

export const DETAIL_HEADER = ["PLID", "PLName", "Cidr", "Description"];
export const LISTING_HEADER = ["PLID", "PLName"];

export type ReportMode = "detail" | "listing";

export interface CsvReport {
  header: string[];
  rows: ReportRow[];
}

const RecordsSchema = z.array(z.array(z.string()));

function toRecord(row: ReportRow, mode: ReportMode): string[] {
  return mode === "detail"
    ? [row.listId, row.listName, row.block, row.description]
    : [row.listId, row.listName];
}

/**
 * Serializes rows under the detail or listing header. Values holding commas,
 * quotes or line breaks are quoted with embedded quotes doubled.
 */
export function serializeCsvReport(
  rows: ReportRow[],
  mode: ReportMode,
): string {
  const header = mode === "detail" ? DETAIL_HEADER : LISTING_HEADER;
  return stringify([header, ...rows.map((row) => toRecord(row, mode))]);
}

/** Reads a report written by serializeCsvReport back into rows. */
export function parseCsvReport(text: string): CsvReport {
  const records = RecordsSchema.parse(
    parse(text, { skip_empty_lines: true }),
  );
  const [header = [], ...data] = records;

  return {
    header,
    rows: data.map(
      ([listId = "", listName = "", block = "", description = ""]) => ({
        listId,
        listName,
        block,
        description,
      }),
    ),
  };
}
