import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_CONFIG_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured config file path (or default) to an absolute path.
 */
export function resolveConfigPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_CONFIG_PATH));
}
