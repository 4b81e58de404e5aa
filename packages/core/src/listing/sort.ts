import type {
  FileEntry,
  ListingResult,
  PageOptions,
  SortKey,
  SortOrder,
} from "../files/types.js";

const SORT_KEY_ALIASES: Record<string, SortKey> = {
  name: "name",
  size: "size",
  modified_time: "modified_time",
  modifiedtime: "modified_time",
  modified: "modified_time",
  created_time: "created_time",
  createdtime: "created_time",
  created: "created_time",
  file_type: "file_type",
  filetype: "file_type",
  type: "file_type",
};

/** Unknown or missing keys fall back to "name". */
export function parseSortKey(raw: string | undefined): SortKey {
  if (!raw) {
    return "name";
  }
  return SORT_KEY_ALIASES[raw.trim().toLowerCase()] ?? "name";
}

export function parseSortOrder(raw: string | undefined): SortOrder {
  return raw?.trim().toLowerCase() === "desc" ? "desc" : "asc";
}

/**
 * Case-insensitive first, then by code point, so "A.txt" and "a.txt" still
 * have a fixed relative order.
 */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) {
    return la < lb ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function compareByKey(a: FileEntry, b: FileEntry, key: SortKey): number {
  switch (key) {
    case "size":
      return a.size - b.size;
    case "modified_time":
      return a.modifiedTime - b.modifiedTime;
    case "created_time":
      return a.createdTime - b.createdTime;
    case "file_type":
      return compareNames(a.fileType ?? "", b.fileType ?? "");
    case "name":
      return compareNames(a.name, b.name);
  }
}

/**
 * Directories come first for every key. Ties on the key are broken by
 * ascending name, then by relPath, so the order is total and pages stay
 * stable across calls.
 */
export function createEntryComparator(
  key: SortKey,
  order: SortOrder,
): (a: FileEntry, b: FileEntry) => number {
  const direction = order === "desc" ? -1 : 1;

  return (a, b) => {
    if (a.isDirectory !== b.isDirectory) {
      return a.isDirectory ? -1 : 1;
    }
    const byKey = compareByKey(a, b, key) * direction;
    if (byKey !== 0) {
      return byKey;
    }
    const byName = compareNames(a.name, b.name);
    if (byName !== 0) {
      return byName;
    }
    return compareNames(a.relPath, b.relPath);
  };
}

/** Sorts the full entry set, then slices [skip, skip + limit). */
export function paginate(
  entries: FileEntry[],
  options: PageOptions,
): ListingResult {
  const sorted = [...entries].sort(
    createEntryComparator(options.sortBy ?? "name", options.order ?? "asc"),
  );
  return {
    totalFiles: sorted.length,
    files: sorted.slice(options.skip, options.skip + options.limit),
    skip: options.skip,
    limit: options.limit,
  };
}
