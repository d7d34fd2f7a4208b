import type { CommandName } from "./args.js";

const COMMON = `Options:
  --plfilter <text>    Only include prefix lists whose name contains this (case-insensitive)
  --plexclude <text>   Exclude prefix lists whose name contains this (case-insensitive)
  --profile <name>     AWS profile to use
  --region <name>      AWS region to use
  --config <path>      Config file (default: ~/.pltools/config.json)
  --csv                Write a CSV report with a timestamped name
  --csv-file <name>    Write a CSV report under this name
  -q, --quiet          Only show errors on the console
  -h, --help           Show help`;

const COMMANDS: Record<CommandName, string> = {
  audit: `Usage: pltools audit [--maxcidr <n>] [options]

Report entries whose CIDR block is larger than /n, i.e. whose prefix length is
smaller than n. Accepts 29 or /29. Defaults to the configured threshold (29).`,
  search: `Usage: pltools search (--name <text> | --ip <text>) [options]

Report entries whose description (--name) or CIDR text (--ip) contains the
search term. Address matching is a plain substring match.`,
  list: `Usage: pltools list [options]

List the prefix lists owned by the current account, sorted by name.`,
};

export function usage(topic?: CommandName): string {
  if (topic) {
    return `${COMMANDS[topic]}\n\n${COMMON}`;
  }
  return `Usage: pltools <command> [options]

Audit, search and list AWS managed prefix lists.

Commands:
  audit    Find entries with oversized CIDR blocks
  search   Find entries by description or address text
  list     List customer-managed prefix lists

Run "pltools <command> --help" for command options.`;
}
