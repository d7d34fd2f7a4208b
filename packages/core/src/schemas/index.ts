export {
  NOT_AVAILABLE,
  PrefixListSchema,
  EntrySchema,
  ReportRowSchema,
  MaxPrefixLengthSchema,
  type PrefixList,
  type Entry,
  type ReportRow,
  type FilterCriteria,
  type SearchField,
  type SearchCriteria,
  type SizeCriteria,
  type ListMatches,
} from "./prefix-list.js";
export {
  DEFAULTS,
  ToolConfigSchema,
  type ToolConfig,
  type LoggingConfig,
  type AwsConfig,
} from "./config.js";
