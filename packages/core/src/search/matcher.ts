import type { FileEntry } from "../files/types.js";

export type MatchField = "name" | "path";

export interface SearchQuery {
  text: string;
  /** Which field the text is matched against. Defaults to "name". */
  field?: MatchField;
}

function hasWildcards(text: string): boolean {
  return text.includes("*") || text.includes("?");
}

function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((ch) => {
      if (ch === "*") return ".*";
      if (ch === "?") return ".";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`, "i");
}

/**
 * Case-insensitive substring match; queries with `*` or `?` are anchored
 * wildcard patterns instead.
 */
export function matches(entry: FileEntry, query: SearchQuery): boolean {
  return createMatcher(query)(entry);
}

/** Compiles a query once for use as a filter over many entries. */
export function createMatcher(query: SearchQuery): (entry: FileEntry) => boolean {
  const field = query.field ?? "name";
  const pick = (entry: FileEntry) => (field === "path" ? entry.relPath : entry.name);

  if (hasWildcards(query.text)) {
    const re = wildcardToRegExp(query.text);
    return (entry) => re.test(pick(entry));
  }

  const needle = query.text.toLowerCase();
  return (entry) => pick(entry).toLowerCase().includes(needle);
}
