export {
  parseCidr,
  isOversized,
  classifyEntries,
  filterOversizedEntries,
  type ParsedCidr,
  type Classification,
} from "./cidr.js";
export { filterByName, displayName, type NameCriteria } from "./names.js";
export { filterByOwner, selectPrefixLists } from "./ownership.js";
export { searchEntries } from "./search.js";
