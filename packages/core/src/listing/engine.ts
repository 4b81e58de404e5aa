import { stat } from "node:fs/promises";
import type { Logger } from "pino";
import { NotFoundError } from "../errors/catalog.js";
import { fromFsError } from "../errors/fs.js";
import type { FileEntry, ListingResult, PageOptions } from "../files/types.js";
import type { PathResolver, ResolvedPath } from "../sandbox/resolver.js";
import { readDirectoryEntries } from "./read-dir.js";
import { paginate } from "./sort.js";

export interface ListOptions extends PageOptions {
  skipHidden?: boolean;
}

export interface ListingEngine {
  /** Paginated, sorted snapshot of one directory's immediate children. */
  list(rawPath: string | undefined, options: ListOptions): Promise<ListingResult>;
}

export interface ListingEngineDeps {
  resolver: PathResolver;
  logger?: Logger;
}

/** Resolves a path and requires it to be an existing directory. */
export async function resolveDirectory(
  resolver: PathResolver,
  rawPath: string | undefined,
): Promise<ResolvedPath> {
  const dir = await resolver.resolve(rawPath);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dir.absolutePath)).isDirectory();
  } catch (err) {
    throw fromFsError(err, { operation: "stat directory", relPath: dir.relPath });
  }
  if (!isDirectory) {
    throw new NotFoundError("Path is not a directory", { path: dir.relPath });
  }
  return dir;
}

export function createListingEngine(deps: ListingEngineDeps): ListingEngine {
  const { resolver, logger } = deps;

  return {
    async list(rawPath, options) {
      const dir = await resolveDirectory(resolver, rawPath);

      let entries: FileEntry[];
      try {
        entries = await readDirectoryEntries(resolver, dir, {
          skipHidden: options.skipHidden ?? false,
          logger,
        });
      } catch (err) {
        logger?.error({ err, path: dir.relPath }, "Failed to read directory");
        throw fromFsError(err, { operation: "list directory", relPath: dir.relPath });
      }

      logger?.debug(
        { path: dir.relPath, count: entries.length },
        "Listed directory",
      );
      return paginate(entries, options);
    },
  };
}
