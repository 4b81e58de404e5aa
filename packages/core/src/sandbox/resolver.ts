import { lstat, realpath, stat } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, sep } from "node:path";
import type { Logger } from "pino";
import { InvalidPathError } from "../errors/catalog.js";
import { errnoCode, fromFsError } from "../errors/fs.js";
import { validateEntryName } from "./names.js";

export interface ResolvedPath {
  /** Location on the server, always inside the root. */
  absolutePath: string;
  /** Root-relative, "/"-separated identifier; "" for the root itself. */
  relPath: string;
}

export interface ResolveChildOptions {
  /**
   * Whether the child is known to be (or not be) a symlink, e.g. from a
   * Dirent. When unknown the child is lstat'ed.
   */
  isSymlink?: boolean;
}

export interface PathResolver {
  /** Canonical absolute root directory. */
  readonly root: string;
  /** Validates a client-supplied root-relative path. */
  resolve(rawPath: string | undefined): Promise<ResolvedPath>;
  /** Resolves a direct child of an already-resolved directory. */
  resolveChild(
    parent: ResolvedPath,
    name: string,
    options?: ResolveChildOptions,
  ): Promise<ResolvedPath>;
}

export interface PathResolverOptions {
  logger?: Logger;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Lexically normalizes a client path into root-relative form.
 *
 * Both separators are accepted, leading slashes are ignored (so
 * "/etc/passwd" names "etc/passwd" under the root), "." segments are
 * dropped and any ".." segment, raw or percent-encoded, is rejected.
 */
export function normalizeRelPath(rawPath: string | undefined): string {
  if (rawPath === undefined) {
    return "";
  }
  if (rawPath.includes("\0")) {
    throw new InvalidPathError("Path contains a NUL byte");
  }

  const segments: string[] = [];
  for (const segment of rawPath.replace(/\\/g, "/").split("/")) {
    if (segment === "" || segment === ".") {
      continue;
    }
    const decoded = decodeSegment(segment);
    if (segment === ".." || decoded === ".." || decoded === ".") {
      throw new InvalidPathError("Path traversal is not allowed");
    }
    if (/[/\\\0]/.test(decoded)) {
      throw new InvalidPathError("Encoded separators are not allowed");
    }
    segments.push(segment);
  }
  return segments.join("/");
}

export function isWithin(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

export function joinRelPath(parent: string, name: string): string {
  return parent === "" ? name : `${parent}/${name}`;
}

/**
 * Creates the resolver for a root directory. The root is canonicalized once
 * so later containment checks compare real paths.
 */
export async function createPathResolver(
  rootDir: string,
  options?: PathResolverOptions,
): Promise<PathResolver> {
  const root = await realpath(rootDir);
  const rootStats = await stat(root);
  if (!rootStats.isDirectory()) {
    throw new Error(`Root is not a directory: ${rootDir}`);
  }

  const logger = options?.logger;

  /** realpath of the deepest existing ancestor of `absolutePath`. */
  async function realAncestor(absolutePath: string): Promise<string> {
    let current = absolutePath;
    for (;;) {
      try {
        return await realpath(current);
      } catch (err) {
        const code = errnoCode(err);
        if ((code !== "ENOENT" && code !== "ENOTDIR") || current === root) {
          throw err;
        }
        current = dirname(current);
      }
    }
  }

  async function assertContained(
    absolutePath: string,
    relPath: string,
  ): Promise<void> {
    let real: string;
    try {
      real = await realAncestor(absolutePath);
    } catch (err) {
      if (errnoCode(err) === "ELOOP") {
        logger?.warn({ path: relPath }, "Rejected path through a symlink loop");
      }
      throw fromFsError(err, { operation: "resolve path", relPath });
    }
    if (!isWithin(root, real)) {
      logger?.warn({ path: relPath }, "Rejected path resolving outside root");
      throw new InvalidPathError("Path resolves outside the root");
    }
  }

  return {
    root,

    async resolve(rawPath) {
      const relPath = normalizeRelPath(rawPath);
      const absolutePath =
        relPath === "" ? root : join(root, ...relPath.split("/"));

      if (!isWithin(root, absolutePath)) {
        throw new InvalidPathError("Path resolves outside the root");
      }
      await assertContained(absolutePath, relPath);

      return { absolutePath, relPath };
    },

    async resolveChild(parent, name, childOptions) {
      validateChildName(name);
      const absolutePath = parent.absolutePath + sep + name;
      const relPath = joinRelPath(parent.relPath, name);

      let isSymlink = childOptions?.isSymlink;
      if (isSymlink === undefined) {
        try {
          isSymlink = (await lstat(absolutePath)).isSymbolicLink();
        } catch (err) {
          if (errnoCode(err) !== "ENOENT") {
            throw fromFsError(err, { operation: "read entry", relPath });
          }
          isSymlink = false;
        }
      }
      if (isSymlink) {
        await assertContained(absolutePath, relPath);
      }

      return { absolutePath, relPath };
    },
  };
}

function validateChildName(name: string): void {
  try {
    validateEntryName(name);
  } catch {
    throw new InvalidPathError("Invalid path component", { name });
  }
}
