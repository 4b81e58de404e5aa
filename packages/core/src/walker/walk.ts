import { stat } from "node:fs/promises";
import type { Logger } from "pino";
import { errnoCode } from "../errors/fs.js";
import type { BoundReason, FileEntry } from "../files/types.js";
import { readDirectoryEntries } from "../listing/read-dir.js";
import { compareNames } from "../listing/sort.js";
import type { PathResolver, ResolvedPath } from "../sandbox/resolver.js";

export interface WalkOptions {
  /** Entries more than this many levels below the start are not visited. */
  maxDepth: number;
  /** Stop after yielding this many entries. */
  maxEntries: number;
  /** Wall-clock budget for the whole walk. */
  timeBudgetMs: number;
  skipHidden: boolean;
  /** When false only the start directory's children are visited. */
  recursive?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface TreeWalk extends AsyncIterable<FileEntry> {
  /** Why the walk did not cover the whole tree, or null if it did. */
  readonly bounded: BoundReason | null;
  /** Entries yielded so far. */
  readonly visited: number;
}

interface Frame {
  dir: ResolvedPath;
  depth: number;
}

function inodeKey(dev: number, ino: number): string {
  return `${dev}:${ino}`;
}

class DepthFirstWalk implements TreeWalk {
  bounded: BoundReason | null = null;
  visited = 0;

  constructor(
    private readonly resolver: PathResolver,
    private readonly start: ResolvedPath,
    private readonly options: WalkOptions,
  ) {}

  private markBounded(reason: BoundReason): void {
    if (this.bounded === null) {
      this.bounded = reason;
      this.options.logger?.warn(
        { path: this.start.relPath, reason, visited: this.visited },
        "Walk result is incomplete",
      );
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<FileEntry> {
    const { maxDepth, maxEntries, timeBudgetMs, logger } = this.options;
    const recursive = this.options.recursive ?? true;
    const deadline = Date.now() + timeBudgetMs;

    const seen = new Set<string>();
    const startStats = await stat(this.start.absolutePath);
    seen.add(inodeKey(startStats.dev, startStats.ino));

    const stack: Frame[] = [{ dir: this.start, depth: 0 }];

    while (stack.length > 0) {
      if (this.options.signal?.aborted) {
        return;
      }
      if (Date.now() > deadline) {
        this.markBounded("time");
        return;
      }

      const frame = stack.pop();
      if (frame === undefined) {
        break;
      }

      let children: FileEntry[];
      try {
        children = await readDirectoryEntries(this.resolver, frame.dir, {
          skipHidden: this.options.skipHidden,
          logger,
        });
      } catch (err) {
        if (frame.dir === this.start) {
          throw err;
        }
        const code = errnoCode(err);
        if (code === "ENOENT" || code === "ENOTDIR") {
          logger?.debug({ path: frame.dir.relPath }, "Directory vanished during walk");
          continue;
        }
        logger?.warn({ err, path: frame.dir.relPath }, "Skipping unreadable directory");
        this.markBounded("unreadable");
        continue;
      }
      children.sort((a, b) => compareNames(a.name, b.name));

      const subdirs: Frame[] = [];
      for (const child of children) {
        if (this.visited >= maxEntries) {
          this.markBounded("entries");
          return;
        }
        this.visited++;
        yield child;

        if (!child.isDirectory || !recursive) {
          continue;
        }
        if (frame.depth + 1 >= maxDepth) {
          this.markBounded("depth");
          continue;
        }

        let key: string;
        try {
          const s = await stat(child.fullName);
          key = inodeKey(s.dev, s.ino);
        } catch (err) {
          logger?.debug({ err, path: child.relPath }, "Directory vanished during walk");
          continue;
        }
        if (seen.has(key)) {
          logger?.debug({ path: child.relPath }, "Skipping already visited directory");
          continue;
        }
        seen.add(key);
        subdirs.push({
          dir: { absolutePath: child.fullName, relPath: child.relPath },
          depth: frame.depth + 1,
        });
      }

      // Reverse so the alphabetically first subdirectory is walked next.
      for (let i = subdirs.length - 1; i >= 0; i--) {
        stack.push(subdirs[i]);
      }
    }
  }
}

/**
 * Lazy depth-first walk below `start`. Each directory's children are
 * yielded in name order before its subdirectories are entered. Directory
 * cycles through symlinks are cut by remembering visited (dev, ino) pairs.
 */
export function walkTree(
  resolver: PathResolver,
  start: ResolvedPath,
  options: WalkOptions,
): TreeWalk {
  return new DepthFirstWalk(resolver, start, options);
}
