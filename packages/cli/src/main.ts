import { join } from "node:path";
import type { Logger } from "pino";
import { loadConfig } from "@pltools/core/config";
import {
  NoPrefixListsError,
  PrefixListToolError,
  SetupError,
} from "@pltools/core/errors";
import { createLogger, type LogDestinations } from "@pltools/core/logger";
import { formatTimestamp } from "@pltools/core/report";
import type { LoggingConfig, ToolConfig } from "@pltools/core/schemas";
import {
  createAwsPrefixListSource,
  type AwsSourceOptions,
  type PrefixListSource,
} from "@pltools/core/source";
import { parseCliArgs, type CliCommand, type HelpCommand } from "./args.js";
import { usage } from "./usage.js";
import type { CommandContext } from "./commands/context.js";
import { runAudit } from "./commands/audit.js";
import { runSearch } from "./commands/search.js";
import { runList } from "./commands/list.js";

export type RunnableCommand = Exclude<CliCommand, HelpCommand>;

export interface CliDeps {
  createSource?: (options: AwsSourceOptions) => PrefixListSource;
  createLogger?: (
    config: LoggingConfig,
    destinations: LogDestinations,
  ) => Logger;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: () => Date;
}

function runCommand(
  context: CommandContext,
  command: RunnableCommand,
): Promise<void> {
  switch (command.command) {
    case "audit":
      return runAudit(context, command);
    case "search":
      return runSearch(context, command);
    case "list":
      return runList(context, command);
  }
}

/**
 * Runs one invocation and resolves to the process exit status. Failures
 * before the logger exists go to stderr; later ones are logged.
 */
export async function runCli(
  argv: string[],
  deps: CliDeps = {},
): Promise<number> {
  const stdout =
    deps.stdout ?? ((line: string) => void process.stdout.write(`${line}\n`));
  const stderr =
    deps.stderr ?? ((line: string) => void process.stderr.write(`${line}\n`));

  let command: RunnableCommand;
  let config: ToolConfig;
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.command === "help") {
      stdout(usage(parsed.topic));
      return 0;
    }
    command = parsed;
    config = await loadConfig({ configPath: parsed.options.configPath });
  } catch (err) {
    if (err instanceof PrefixListToolError) {
      stderr(`Error: ${err.message}`);
      stderr('Run "pltools --help" for usage.');
      return err.exitCode;
    }
    throw err;
  }

  const { options } = command;
  const startedAt = deps.now?.() ?? new Date();
  const logFile = join(
    config.output.logsDir,
    `pltools_${command.command}-${formatTimestamp(startedAt)}.log`,
  );
  const logger = (deps.createLogger ?? createLogger)(config.logging, {
    consoleLevel: options.quiet ? "error" : config.logging.level,
    file: logFile,
  });
  logger.info(
    { command: command.command, logFile },
    `Logging initiated. Output log file: ${logFile}`,
  );

  try {
    let source: PrefixListSource;
    try {
      source = (deps.createSource ?? createAwsPrefixListSource)({
        profile: options.profile ?? config.aws.profile ?? undefined,
        region: options.region ?? config.aws.region ?? undefined,
        logger,
      });
    } catch (err) {
      throw new SetupError("Failed to set up AWS clients", {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    await runCommand(
      { config, logger, source, print: stdout, startedAt },
      command,
    );
    return 0;
  } catch (err) {
    if (err instanceof NoPrefixListsError) {
      logger.warn({ errorCode: err.errorCode, ...err.details }, err.message);
      stdout(`${err.message}.`);
      return err.exitCode;
    }
    if (err instanceof PrefixListToolError) {
      logger.error(
        { errorCode: err.errorCode, ...err.details },
        err.message,
      );
      return err.exitCode;
    }
    logger.error({ err }, "Unexpected failure");
    return 1;
  }
}
