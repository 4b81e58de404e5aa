import { stat } from "node:fs/promises";
import type { Logger } from "pino";
import { NotFoundError } from "../errors/catalog.js";
import { fromFsError } from "../errors/fs.js";
import type { ThumbnailConfig } from "../schemas/server-config.js";
import type { PathResolver } from "../sandbox/resolver.js";
import { ThumbnailCache, type ThumbnailCacheStats } from "./cache.js";
import type { ThumbnailGenerator } from "./generator.js";

export interface Thumbnail {
  bytes: Uint8Array;
  contentType: "image/jpeg";
  /** mtime of the source the thumbnail was rendered from. */
  modifiedTime: number;
}

export interface ThumbnailService {
  getThumbnail(rawPath: string | undefined): Promise<Thumbnail>;
  invalidate(relPath: string): void;
  stats(): ThumbnailCacheStats;
}

export interface ThumbnailServiceDeps {
  resolver: PathResolver;
  generator: ThumbnailGenerator;
  config: Pick<ThumbnailConfig, "width" | "maxEntries" | "maxBytes" | "failureTtlMs">;
  logger?: Logger;
  now?: () => number;
}

export function createThumbnailService(deps: ThumbnailServiceDeps): ThumbnailService {
  const { resolver, generator, config, logger } = deps;
  const cache = new ThumbnailCache({
    maxEntries: config.maxEntries,
    maxBytes: config.maxBytes,
    failureTtlMs: config.failureTtlMs,
    logger,
    now: deps.now,
  });

  return {
    async getThumbnail(rawPath) {
      const source = await resolver.resolve(rawPath);

      let modifiedTime: number;
      try {
        const stats = await stat(source.absolutePath);
        if (!stats.isFile()) {
          throw new NotFoundError("Path is not a file", { path: source.relPath });
        }
        modifiedTime = Math.floor(stats.mtimeMs);
      } catch (err) {
        throw fromFsError(err, { operation: "stat file", relPath: source.relPath });
      }

      const bytes = await cache.get({ relPath: source.relPath, modifiedTime }, () => {
        logger?.debug({ path: source.relPath }, "Generating thumbnail");
        return generator.generate(source, config.width);
      });
      return { bytes, contentType: "image/jpeg", modifiedTime };
    },

    invalidate(relPath) {
      cache.invalidate(relPath);
    },

    stats() {
      return cache.stats();
    },
  };
}
