import type { Logger } from "pino";
import { InvalidRequestError } from "../errors/catalog.js";
import { fromFsError } from "../errors/fs.js";
import { isVideoName } from "../files/entry.js";
import type { FileEntry, ListingResult, PageOptions } from "../files/types.js";
import { resolveDirectory } from "../listing/engine.js";
import { paginate } from "../listing/sort.js";
import type { WalkConfig } from "../schemas/server-config.js";
import type { PathResolver } from "../sandbox/resolver.js";
import { walkTree } from "../walker/walk.js";
import { createMatcher, type SearchQuery } from "./matcher.js";

export interface DiscoveryOptions extends PageOptions {
  skipHidden?: boolean;
  /** Walk the subtree (default) or only the directory's children. */
  recursive?: boolean;
  signal?: AbortSignal;
}

export interface DiscoveryService {
  /** Files below `rawPath` whose name (or path) matches the query. */
  search(
    rawPath: string | undefined,
    query: SearchQuery,
    options: DiscoveryOptions,
  ): Promise<ListingResult>;
  /** Video files below `rawPath`, recognised by extension. */
  videos(rawPath: string | undefined, options: DiscoveryOptions): Promise<ListingResult>;
}

export interface DiscoveryDeps {
  resolver: PathResolver;
  walk: WalkConfig;
  logger?: Logger;
}

export function createDiscoveryService(deps: DiscoveryDeps): DiscoveryService {
  const { resolver, logger } = deps;

  /**
   * Walks the subtree and keeps every file accepted by `predicate`.
   * totalFiles is the exact match count within the walk's bounds; when a
   * bound trips the result says which one.
   */
  async function collect(
    rawPath: string | undefined,
    predicate: (entry: FileEntry) => boolean,
    options: DiscoveryOptions,
  ): Promise<ListingResult> {
    const start = await resolveDirectory(resolver, rawPath);
    const walk = walkTree(resolver, start, {
      ...deps.walk,
      skipHidden: options.skipHidden ?? false,
      recursive: options.recursive ?? true,
      signal: options.signal,
      logger,
    });

    const found: FileEntry[] = [];
    try {
      for await (const entry of walk) {
        if (!entry.isDirectory && predicate(entry)) {
          found.push(entry);
        }
      }
    } catch (err) {
      logger?.error({ err, path: start.relPath }, "Walk failed");
      throw fromFsError(err, { operation: "walk directory", relPath: start.relPath });
    }

    const result = paginate(found, options);
    logger?.debug(
      { path: start.relPath, visited: walk.visited, matches: found.length },
      "Walk complete",
    );
    return walk.bounded === null ? result : { ...result, truncated: walk.bounded };
  }

  return {
    async search(rawPath, query, options) {
      if (query.text.trim().length === 0) {
        throw new InvalidRequestError("Missing search query");
      }
      return collect(rawPath, createMatcher(query), options);
    },

    async videos(rawPath, options) {
      return collect(rawPath, (entry) => isVideoName(entry.name), options);
    },
  };
}
