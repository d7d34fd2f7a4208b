export type { PrefixListSource } from "./interface.js";
export {
  createAwsPrefixListSource,
  toPrefixList,
  toEntry,
  type AwsSourceOptions,
} from "./aws.js";
