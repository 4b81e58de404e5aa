import { createRequire } from "node:module";
import type { ServerConfig } from "@filedock/core/schemas";
import { resolveServedRoot } from "@filedock/core/config";
import { createLogger, type Logger } from "@filedock/core/logger";
import { createPathResolver, type PathResolver } from "@filedock/core/sandbox";
import { createListingEngine } from "@filedock/core/listing";
import { createDiscoveryService } from "@filedock/core/search";
import {
  createMediaThumbnailGenerator,
  createThumbnailService,
  type ThumbnailGenerator,
  type ThumbnailService,
} from "@filedock/core/thumbnails";
import { createMutationCoordinator } from "@filedock/core/mutations";
import type { Hono } from "hono";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  /** Canonical absolute path of the served directory. */
  root: string;
  resolver: PathResolver;
  thumbnails: ThumbnailService;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  /** Replaces the pino logger built from config.logging. */
  logger?: Logger;
  /** Replaces the sharp/ffmpeg thumbnail generator. */
  thumbnailGenerator?: ThumbnailGenerator;
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const resolver = await createPathResolver(
    resolveServedRoot(config.storage.rootDir),
    { logger },
  );
  logger.info({ root: resolver.root }, "Serving directory");

  const listing = createListingEngine({ resolver, logger });
  const discovery = createDiscoveryService({ resolver, walk: config.walk, logger });

  const generator =
    options?.thumbnailGenerator ??
    createMediaThumbnailGenerator({
      ffmpegPath: config.thumbnails.ffmpegPath,
      videoSeekSeconds: config.thumbnails.videoSeekSeconds,
      timeoutMs: config.thumbnails.timeoutMs,
      logger,
    });
  const thumbnails = createThumbnailService({
    resolver,
    generator,
    config: config.thumbnails,
    logger,
  });

  const mutations = createMutationCoordinator({
    resolver,
    allowCrossDeviceCopy: config.mutations.allowCrossDeviceCopy,
    logger,
    onMoved: (from) => thumbnails.invalidate(from),
  });

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    config,
    resolver,
    listing,
    discovery,
    thumbnails,
    mutations,
  });

  const cleanup = async () => {
    logger.flush();
  };

  return {
    app,
    logger,
    config,
    startedAt,
    root: resolver.root,
    resolver,
    thumbnails,
    cleanup,
  };
}
