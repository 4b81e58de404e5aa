import type { Logger } from "pino";
import { GenerationFailedError } from "../errors/catalog.js";

/** Identity of one rendition: the file and the mtime it was rendered from. */
export interface ThumbnailKey {
  relPath: string;
  modifiedTime: number;
}

type CacheEntry =
  | { state: "pending"; promise: Promise<Uint8Array> }
  | { state: "ready"; bytes: Uint8Array }
  | { state: "failed"; error: Error; expiresAt: number };

export interface ThumbnailCacheOptions {
  maxEntries: number;
  maxBytes: number;
  failureTtlMs: number;
  logger?: Logger;
  /** Clock override for tests. */
  now?: () => number;
}

export interface ThumbnailCacheStats {
  entries: number;
  bytes: number;
  pending: number;
}

function keyString(key: ThumbnailKey): string {
  return `${key.relPath}\u0000${key.modifiedTime}`;
}

function pathOf(id: string): string {
  return id.slice(0, id.lastIndexOf("\u0000"));
}

/**
 * In-memory LRU of rendered thumbnails.
 *
 * Each key moves through pending → ready | failed. A caller that finds a
 * pending entry awaits the same promise, so one generation serves every
 * concurrent request for the key. Failures are remembered for
 * `failureTtlMs` and rethrown without regenerating. The index is only
 * touched synchronously; generation itself runs outside of it.
 *
 * Map insertion order doubles as recency order: a hit deletes and
 * re-inserts the key.
 */
export class ThumbnailCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly latestByPath = new Map<string, string>();
  private totalBytes = 0;
  private readonly now: () => number;

  constructor(private readonly options: ThumbnailCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  async get(
    key: ThumbnailKey,
    generate: () => Promise<Uint8Array>,
  ): Promise<Uint8Array> {
    const id = keyString(key);
    const existing = this.entries.get(id);

    if (existing !== undefined) {
      switch (existing.state) {
        case "ready":
          this.touch(id, existing);
          return existing.bytes;
        case "pending":
          return existing.promise;
        case "failed":
          if (existing.expiresAt > this.now()) {
            this.options.logger?.warn(
              { path: key.relPath },
              "Thumbnail generation recently failed; serving cached failure",
            );
            throw existing.error;
          }
          this.remove(id);
          break;
      }
    }

    this.forgetStale(key.relPath, id);
    const promise = this.run(id, generate);
    this.entries.set(id, { state: "pending", promise });
    return promise;
  }

  stats(): ThumbnailCacheStats {
    let pending = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === "pending") {
        pending++;
      }
    }
    return { entries: this.entries.size, bytes: this.totalBytes, pending };
  }

  /**
   * Drops every rendition of a path and of anything below it, e.g. after a
   * directory was moved.
   */
  invalidate(relPath: string): void {
    const below = `${relPath}/`;
    const covers = (path: string) => path === relPath || path.startsWith(below);
    for (const [id, entry] of this.entries) {
      if (entry.state !== "pending" && covers(pathOf(id))) {
        this.remove(id);
      }
    }
    for (const path of [...this.latestByPath.keys()]) {
      if (covers(path)) {
        this.latestByPath.delete(path);
      }
    }
  }

  private async run(
    id: string,
    generate: () => Promise<Uint8Array>,
  ): Promise<Uint8Array> {
    // Let the caller register the pending entry before generation starts.
    await Promise.resolve();
    try {
      const bytes = await generate();
      if (this.entries.has(id)) {
        this.entries.delete(id);
        this.entries.set(id, { state: "ready", bytes });
        this.totalBytes += bytes.byteLength;
        this.evict();
      }
      return bytes;
    } catch (err) {
      const error =
        err instanceof Error ? err : new GenerationFailedError();
      if (this.entries.has(id)) {
        this.entries.set(id, {
          state: "failed",
          error,
          expiresAt: this.now() + this.options.failureTtlMs,
        });
        this.evict();
      }
      throw error;
    }
  }

  private touch(id: string, entry: CacheEntry): void {
    this.entries.delete(id);
    this.entries.set(id, entry);
  }

  private remove(id: string): void {
    const entry = this.entries.get(id);
    if (entry?.state === "ready") {
      this.totalBytes -= entry.bytes.byteLength;
    }
    this.entries.delete(id);
    const relPath = pathOf(id);
    if (this.latestByPath.get(relPath) === id) {
      this.latestByPath.delete(relPath);
    }
  }

  /** A new mtime for a path makes older renditions unreachable. */
  private forgetStale(relPath: string, id: string): void {
    const previous = this.latestByPath.get(relPath);
    if (previous !== undefined && previous !== id) {
      const entry = this.entries.get(previous);
      if (entry !== undefined && entry.state !== "pending") {
        this.remove(previous);
      }
    }
    this.latestByPath.set(relPath, id);
  }

  /** Evicts least recently used settled entries; pending ones are never evicted. */
  private evict(): void {
    const { maxEntries, maxBytes, logger } = this.options;
    for (const [id, entry] of this.entries) {
      if (this.entries.size <= maxEntries && this.totalBytes <= maxBytes) {
        return;
      }
      if (entry.state === "pending") {
        continue;
      }
      this.remove(id);
      logger?.debug({ key: id.replace("\u0000", "@") }, "Evicted thumbnail");
    }
  }
}
