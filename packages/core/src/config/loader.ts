import { readFile } from "node:fs/promises";
import { ToolConfigSchema, type ToolConfig } from "../schemas/config.js";
import { ConfigurationError } from "../errors/catalog.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
}

/**
 * Reads the JSON config file, filling in defaults. A missing file yields the
 * defaults; unreadable, malformed or invalid files raise ConfigurationError.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ToolConfig> {
  const configPath = resolveConfigPath(options?.configPath);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw new ConfigurationError(`Cannot read config file ${configPath}`, {
        configPath,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`Malformed JSON in ${configPath}`, {
        configPath,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const result = ToolConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${configPath}`, {
      configPath,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
