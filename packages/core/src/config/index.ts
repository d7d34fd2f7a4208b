export { DEFAULT_ROOT_PATH, DEFAULT_CONFIG_PATH } from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveConfigPath } from "./paths.js";
