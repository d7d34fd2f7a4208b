import { parseArgs, type ParseArgsConfig } from "node:util";
import { ConfigurationError } from "@pltools/core/errors";
import type { ExportTarget } from "@pltools/core/report";
import {
  MaxPrefixLengthSchema,
  type SearchCriteria,
} from "@pltools/core/schemas";

export type CommandName = "audit" | "search" | "list";

export interface CommonOptions {
  nameInclude?: string;
  nameExclude?: string;
  profile?: string;
  region?: string;
  configPath?: string;
  quiet: boolean;
  exportTarget: ExportTarget;
}

export interface AuditCommand {
  command: "audit";
  options: CommonOptions;
  /** Unset means the configured default. */
  maxPrefixLength?: number;
}

export interface SearchCommand {
  command: "search";
  options: CommonOptions;
  criteria: SearchCriteria;
}

export interface ListCommand {
  command: "list";
  options: CommonOptions;
}

export interface HelpCommand {
  command: "help";
  topic?: CommandName;
}

export type CliCommand = AuditCommand | SearchCommand | ListCommand | HelpCommand;

const COMMON_OPTIONS = {
  plfilter: { type: "string" },
  plexclude: { type: "string" },
  profile: { type: "string" },
  region: { type: "string" },
  config: { type: "string" },
  csv: { type: "boolean" },
  "csv-file": { type: "string" },
  quiet: { type: "boolean", short: "q" },
  help: { type: "boolean", short: "h" },
} satisfies ParseArgsConfig["options"];

const AUDIT_OPTIONS = {
  ...COMMON_OPTIONS,
  maxcidr: { type: "string" },
} satisfies ParseArgsConfig["options"];

const SEARCH_OPTIONS = {
  ...COMMON_OPTIONS,
  name: { type: "string" },
  ip: { type: "string" },
} satisfies ParseArgsConfig["options"];

function isCommandName(value: string): value is CommandName {
  return value === "audit" || value === "search" || value === "list";
}

/** Runs a parseArgs call, turning its usage errors into ConfigurationError. */
function parseOrThrow<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new ConfigurationError(
      err instanceof Error ? err.message : String(err),
    );
  }
}

function toCommon(values: {
  plfilter?: string;
  plexclude?: string;
  profile?: string;
  region?: string;
  config?: string;
  csv?: boolean;
  "csv-file"?: string;
  quiet?: boolean;
}): CommonOptions {
  const csvFile = values["csv-file"];
  const exportTarget: ExportTarget =
    csvFile !== undefined
      ? { kind: "named", filename: csvFile }
      : values.csv
        ? { kind: "default-name" }
        : { kind: "disabled" };

  return {
    nameInclude: values.plfilter,
    nameExclude: values.plexclude,
    profile: values.profile,
    region: values.region,
    configPath: values.config,
    quiet: values.quiet ?? false,
    exportTarget,
  };
}

/** Accepts "29" or "/29"; anything outside 0–32 is a configuration error. */
export function parseMaxPrefixLength(value: string): number {
  const digits = value.startsWith("/") ? value.slice(1) : value;
  const parsed = /^\d+$/.test(digits)
    ? MaxPrefixLengthSchema.safeParse(Number(digits))
    : undefined;
  if (!parsed?.success) {
    throw new ConfigurationError(
      "Invalid --maxcidr value. Please specify a number like 29 or /29.",
      { maxcidr: value },
    );
  }
  return parsed.data;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [first, ...rest] = argv;
  if (first === undefined || first === "--help" || first === "-h") {
    return { command: "help" };
  }
  if (!isCommandName(first)) {
    throw new ConfigurationError(`Unknown command "${first}"`, {
      command: first,
    });
  }

  switch (first) {
    case "audit": {
      const { values } = parseOrThrow(() =>
        parseArgs({ args: rest, options: AUDIT_OPTIONS }),
      );
      if (values.help) return { command: "help", topic: first };
      return {
        command: "audit",
        options: toCommon(values),
        ...(values.maxcidr !== undefined && {
          maxPrefixLength: parseMaxPrefixLength(values.maxcidr),
        }),
      };
    }
    case "search": {
      const { values } = parseOrThrow(() =>
        parseArgs({ args: rest, options: SEARCH_OPTIONS }),
      );
      if (values.help) return { command: "help", topic: first };
      if ((values.name === undefined) === (values.ip === undefined)) {
        throw new ConfigurationError("Specify exactly one of --name or --ip");
      }
      const criteria: SearchCriteria =
        values.name !== undefined
          ? { field: "description", term: values.name }
          : { field: "address", term: values.ip ?? "" };
      return { command: "search", options: toCommon(values), criteria };
    }
    case "list": {
      const { values } = parseOrThrow(() =>
        parseArgs({ args: rest, options: COMMON_OPTIONS }),
      );
      if (values.help) return { command: "help", topic: first };
      return { command: "list", options: toCommon(values) };
    }
  }
}
