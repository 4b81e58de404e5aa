export {
  matches,
  createMatcher,
  type SearchQuery,
  type MatchField,
} from "./matcher.js";
export {
  createDiscoveryService,
  type DiscoveryService,
  type DiscoveryDeps,
  type DiscoveryOptions,
} from "./service.js";
