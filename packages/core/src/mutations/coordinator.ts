import { randomUUID } from "node:crypto";
import { cp, lstat, mkdir, rename, rm, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { dirname, join } from "node:path";
import type { Logger } from "pino";
import {
  ConflictError,
  CrossDeviceMoveError,
  InvalidPathError,
  NotFoundError,
} from "../errors/catalog.js";
import { errnoCode, fromFsError } from "../errors/fs.js";
import { UPLOAD_TEMP_PREFIX, validateEntryName } from "../sandbox/names.js";
import type { PathResolver, ResolvedPath } from "../sandbox/resolver.js";

export interface CreateFolderResult {
  relPath: string;
}

export type MoveMethod = "rename" | "copy";

export interface MoveResult {
  from: string;
  to: string;
  /** "copy" only when a cross-volume fallback was explicitly allowed. */
  method: MoveMethod;
}

export interface MutationCoordinator {
  createFolder(rawParent: string | undefined, name: string | undefined): Promise<CreateFolderResult>;
  move(rawFrom: string | undefined, rawTo: string | undefined): Promise<MoveResult>;
}

export interface MutationCoordinatorDeps {
  resolver: PathResolver;
  allowCrossDeviceCopy: boolean;
  logger?: Logger;
  /** Called with the old path after a successful move. */
  onMoved?: (from: string) => void;
  /** Same-volume rename primitive; replaceable in tests. */
  rename?: (from: string, to: string) => Promise<void>;
}

async function lstatOrNull(absolutePath: string): Promise<Stats | null> {
  try {
    return await lstat(absolutePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

async function exists(absolutePath: string): Promise<boolean> {
  return (await lstatOrNull(absolutePath)) !== null;
}

function splitParent(relPath: string): { parent: string; name: string } {
  const slash = relPath.lastIndexOf("/");
  return slash === -1
    ? { parent: "", name: relPath }
    : { parent: relPath.slice(0, slash), name: relPath.slice(slash + 1) };
}

export function createMutationCoordinator(deps: MutationCoordinatorDeps): MutationCoordinator {
  const { resolver, logger } = deps;
  const renameEntry = deps.rename ?? rename;

  async function requireDirectory(dir: ResolvedPath, what: string): Promise<void> {
    try {
      if (!(await stat(dir.absolutePath)).isDirectory()) {
        throw new NotFoundError(`${what} is not a directory`, { path: dir.relPath });
      }
    } catch (err) {
      throw fromFsError(err, { operation: "stat directory", relPath: dir.relPath });
    }
  }

  /**
   * Copies into a hidden sibling of the destination, renames it into place
   * and only then removes the source. A failure before the rename leaves
   * the source untouched and the temp copy removed.
   */
  async function copyAcross(from: ResolvedPath, to: ResolvedPath): Promise<void> {
    const temp = join(dirname(to.absolutePath), `${UPLOAD_TEMP_PREFIX}${randomUUID()}.move`);
    try {
      await cp(from.absolutePath, temp, {
        recursive: true,
        errorOnExist: true,
        force: false,
        preserveTimestamps: true,
      });
      if (await exists(to.absolutePath)) {
        throw new ConflictError("Destination already exists", { path: to.relPath });
      }
      await rename(temp, to.absolutePath);
    } catch (err) {
      await rm(temp, { recursive: true, force: true });
      throw err;
    }
    await rm(from.absolutePath, { recursive: true, force: true });
  }

  return {
    async createFolder(rawParent, rawName) {
      const name = validateEntryName(rawName);
      const parent = await resolver.resolve(rawParent);
      await requireDirectory(parent, "Parent");

      const target = await resolver.resolveChild(parent, name);
      try {
        await mkdir(target.absolutePath);
      } catch (err) {
        if (errnoCode(err) === "EEXIST") {
          throw new ConflictError("Folder already exists", { path: target.relPath });
        }
        logger?.error({ err, path: target.relPath }, "Failed to create folder");
        throw fromFsError(err, { operation: "create folder", relPath: target.relPath });
      }

      logger?.info({ path: target.relPath }, "Folder created");
      return { relPath: target.relPath };
    },

    async move(rawFrom, rawTo) {
      const from = await resolver.resolve(rawFrom);
      const to = await resolver.resolve(rawTo);

      if (from.relPath === "" || to.relPath === "") {
        throw new InvalidPathError("The root cannot be moved or replaced");
      }
      if (to.relPath === from.relPath) {
        throw new ConflictError("Source and destination are the same", { path: to.relPath });
      }
      if (to.relPath.startsWith(`${from.relPath}/`)) {
        throw new InvalidPathError("Cannot move a directory into itself", {
          from: from.relPath,
          to: to.relPath,
        });
      }

      const { parent, name } = splitParent(to.relPath);
      validateEntryName(name);

      let source: Stats | null;
      try {
        source = await lstatOrNull(from.absolutePath);
      } catch (err) {
        throw fromFsError(err, { operation: "stat source", relPath: from.relPath });
      }
      if (source === null) {
        throw new NotFoundError("Source not found", { path: from.relPath });
      }
      await requireDirectory(await resolver.resolve(parent), "Destination parent");

      // Last check before the rename; an entry created at `to` after it is
      // replaced, since rename has no no-replace mode here.
      try {
        if (await exists(to.absolutePath)) {
          throw new ConflictError("Destination already exists", { path: to.relPath });
        }
      } catch (err) {
        throw fromFsError(err, { operation: "stat destination", relPath: to.relPath });
      }

      let method: MoveMethod = "rename";
      try {
        await renameEntry(from.absolutePath, to.absolutePath);
      } catch (err) {
        if (errnoCode(err) !== "EXDEV") {
          const mapped = fromFsError(err, { operation: "move", relPath: from.relPath });
          if (mapped.clientError) {
            logger?.warn({ from: from.relPath, to: to.relPath, errorCode: mapped.errorCode }, "Move refused");
          } else {
            logger?.error({ err, from: from.relPath, to: to.relPath }, "Move failed");
          }
          throw mapped;
        }
        if (!deps.allowCrossDeviceCopy) {
          logger?.warn({ from: from.relPath, to: to.relPath }, "Refusing cross-volume move");
          throw new CrossDeviceMoveError({ from: from.relPath, to: to.relPath });
        }
        logger?.warn({ from: from.relPath, to: to.relPath }, "Moving across volumes by copy");
        try {
          await copyAcross(from, to);
        } catch (copyErr) {
          logger?.error({ err: copyErr, from: from.relPath, to: to.relPath }, "Cross-volume copy failed");
          throw fromFsError(copyErr, { operation: "copy across volumes", relPath: from.relPath });
        }
        method = "copy";
      }

      deps.onMoved?.(from.relPath);
      logger?.info({ from: from.relPath, to: to.relPath, method }, "Moved");
      return { from: from.relPath, to: to.relPath, method };
    },
  };
}
