export {
  createPathResolver,
  normalizeRelPath,
  isWithin,
  joinRelPath,
  type PathResolver,
  type PathResolverOptions,
  type ResolvedPath,
  type ResolveChildOptions,
} from "./resolver.js";
export {
  validateEntryName,
  isHiddenName,
  isReservedName,
  UPLOAD_TEMP_PREFIX,
} from "./names.js";
