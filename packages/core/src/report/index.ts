export {
  buildListing,
  collectMatches,
  buildDetailReport,
  toReportRows,
  listingRows,
  type EntrySelector,
  type Diagnostic,
  type CollectResult,
  type DetailEntry,
  type DetailSection,
  type DetailReport,
} from "./aggregate.js";
export { formatDetailReport, formatListing } from "./format.js";
export {
  DETAIL_HEADER,
  LISTING_HEADER,
  serializeCsvReport,
  parseCsvReport,
  type ReportMode,
  type CsvReport,
} from "./csv.js";
export {
  formatTimestamp,
  resolveReportFilename,
  type ExportTarget,
} from "./export-target.js";
