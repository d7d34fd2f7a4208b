export {
  PrefixListToolError,
  ConfigurationError,
  SetupError,
  NoPrefixListsError,
  EntryFetchError,
  InvalidCidrError,
  ReportWriteError,
} from "./catalog.js";
