import { readdir } from "node:fs/promises";
import type { Logger } from "pino";
import { FileServiceError, InvalidPathError } from "../errors/catalog.js";
import { errnoCode, fromFsError } from "../errors/fs.js";
import { statEntry } from "../files/entry.js";
import type { FileEntry } from "../files/types.js";
import { isHiddenName, isReservedName } from "../sandbox/names.js";
import { joinRelPath, type PathResolver, type ResolvedPath } from "../sandbox/resolver.js";

export interface ReadDirectoryOptions {
  skipHidden: boolean;
  logger?: Logger;
}

/**
 * Snapshots the immediate children of a directory. Children that vanish
 * mid-read, symlinks leaving the root or looping back on themselves,
 * entries that cannot be stat'ed and in-flight upload temp files are left
 * out. Errors reading the directory itself propagate raw.
 */
export async function readDirectoryEntries(
  resolver: PathResolver,
  dir: ResolvedPath,
  options: ReadDirectoryOptions,
): Promise<FileEntry[]> {
  const dirents = await readdir(dir.absolutePath, { withFileTypes: true });

  const entries = await Promise.all(
    dirents
      .filter(
        (d) =>
          !isReservedName(d.name) && !(options.skipHidden && isHiddenName(d.name)),
      )
      .map(async (d) => {
        const relPath = joinRelPath(dir.relPath, d.name);
        try {
          const child = await resolver.resolveChild(dir, d.name, {
            isSymlink: d.isSymbolicLink(),
          });
          return await statEntry(child);
        } catch (err) {
          if (!(err instanceof FileServiceError) && errnoCode(err) === undefined) {
            throw err;
          }
          const reason = fromFsError(err, { operation: "read entry", relPath });
          if (reason instanceof InvalidPathError) {
            options.logger?.debug({ path: relPath, reason: reason.message }, "Skipping entry");
          } else {
            options.logger?.warn({ path: relPath, errorCode: reason.errorCode }, "Skipping unreadable entry");
          }
          return null;
        }
      }),
  );

  return entries.filter((e): e is FileEntry => e !== null);
}
