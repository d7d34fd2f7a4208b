import { z } from "zod";
import { MaxPrefixLengthSchema } from "./prefix-list.js";

export const DEFAULTS = {
  aws: {
    profile: null,
    region: null,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  output: {
    reportsDir: "reports",
    logsDir: "logs",
  },
  audit: {
    maxPrefixLength: 29,
  },
};

export const ToolConfigSchema = z.object({
  aws: z
    .object({
      profile: z
        .string()
        .min(1)
        .nullable()
        .default(DEFAULTS.aws.profile)
        .describe("Named profile from the shared AWS config files"),
      region: z.string().min(1).nullable().default(DEFAULTS.aws.region),
    })
    .default(DEFAULTS.aws),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  output: z
    .object({
      reportsDir: z.string().min(1).default(DEFAULTS.output.reportsDir),
      logsDir: z.string().min(1).default(DEFAULTS.output.logsDir),
    })
    .default(DEFAULTS.output),
  audit: z
    .object({
      maxPrefixLength: MaxPrefixLengthSchema.default(
        DEFAULTS.audit.maxPrefixLength,
      ),
    })
    .default(DEFAULTS.audit),
});

export type ToolConfig = z.infer<typeof ToolConfigSchema>;
export type LoggingConfig = ToolConfig["logging"];
export type AwsConfig = ToolConfig["aws"];
