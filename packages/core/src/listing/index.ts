export {
  createListingEngine,
  resolveDirectory,
  type ListingEngine,
  type ListingEngineDeps,
  type ListOptions,
} from "./engine.js";
export { readDirectoryEntries, type ReadDirectoryOptions } from "./read-dir.js";
export {
  paginate,
  parseSortKey,
  parseSortOrder,
  compareNames,
  createEntryComparator,
} from "./sort.js";
