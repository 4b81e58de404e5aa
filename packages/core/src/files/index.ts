export type {
  FileEntry,
  ListingResult,
  PageOptions,
  SortKey,
  SortOrder,
  BoundReason,
} from "./types.js";
export {
  statEntry,
  toFileEntry,
  guessMimeType,
  isVideoName,
  isImageName,
} from "./entry.js";
