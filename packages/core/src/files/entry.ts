import type { Stats } from "node:fs";
import { lstat, stat } from "node:fs/promises";
import mime from "mime-types";
import type { ResolvedPath } from "../sandbox/resolver.js";
import { errnoCode } from "../errors/fs.js";
import type { FileEntry } from "./types.js";

export function guessMimeType(name: string): string {
  return mime.lookup(name) || "application/octet-stream";
}

export function isVideoName(name: string): boolean {
  const type = mime.lookup(name);
  return type !== false && type.startsWith("video/");
}

export function isImageName(name: string): boolean {
  const type = mime.lookup(name);
  return type !== false && type.startsWith("image/");
}

function baseName(relPath: string): string {
  const slash = relPath.lastIndexOf("/");
  return slash === -1 ? relPath : relPath.slice(slash + 1);
}

function parentOf(relPath: string): string | null {
  if (relPath === "") {
    return null;
  }
  const slash = relPath.lastIndexOf("/");
  return slash === -1 ? "" : relPath.slice(0, slash);
}

export function toFileEntry(resolved: ResolvedPath, stats: Stats): FileEntry {
  const isDirectory = stats.isDirectory();
  const name = baseName(resolved.relPath);

  return {
    name,
    fullName: resolved.absolutePath,
    relPath: resolved.relPath,
    size: isDirectory ? 0 : stats.size,
    isDirectory,
    createdTime: Math.floor(stats.birthtimeMs || stats.ctimeMs),
    modifiedTime: Math.floor(stats.mtimeMs),
    fileType: isDirectory ? null : guessMimeType(name),
    owner: String(stats.uid),
    parentDir: parentOf(resolved.relPath),
  };
}

/**
 * Stats a resolved path into a FileEntry. Symlinks are followed; a dangling
 * symlink is described by the link itself. Returns null when the path
 * vanished (a concurrent delete or move).
 */
export async function statEntry(
  resolved: ResolvedPath,
): Promise<FileEntry | null> {
  let stats: Stats;
  try {
    stats = await stat(resolved.absolutePath);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
    try {
      stats = await lstat(resolved.absolutePath);
    } catch (inner) {
      if (errnoCode(inner) === "ENOENT") {
        return null;
      }
      throw inner;
    }
  }
  return toFileEntry(resolved, stats);
}
