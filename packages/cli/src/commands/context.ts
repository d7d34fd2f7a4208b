import type { Logger } from "pino";
import type { ToolConfig } from "@pltools/core/schemas";
import type { PrefixListSource } from "@pltools/core/source";

/** Everything a command needs for one invocation. */
export interface CommandContext {
  config: ToolConfig;
  logger: Logger;
  source: PrefixListSource;
  /** Writes one report line to stdout. */
  print: (line: string) => void;
  /** Start of the run, used for default report names. */
  startedAt: Date;
}
