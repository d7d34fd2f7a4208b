import type { DetailReport } from "./aggregate.js";

export function formatDetailReport(report: DetailReport): string[] {
  return report.sections.flatMap((section) => [
    `${section.listId} | ${section.listName} | ${section.count} matching entries`,
    ...section.entries.map(
      (entry) => `  ${entry.block} | ${entry.description}`,
    ),
  ]);
}

export function formatListing(listing: Map<string, string>): string[] {
  return [...listing].map(([listId, listName]) => `${listId} | ${listName}`);
}
