export {
  createInMemorySource,
  PrefixListNotFoundError,
  type InMemorySource,
  type InMemorySourceData,
} from "./source.js";
export {
  createCaptureLogger,
  type CaptureLogger,
  type CapturedLog,
} from "./logger.js";
