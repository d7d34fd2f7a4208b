export * from "./schemas/index.js";
export * from "./filters/index.js";
export * from "./report/index.js";
export * from "./errors/index.js";
export type { PrefixListSource } from "./source/index.js";
