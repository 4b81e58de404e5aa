import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 8080,
    host: "0.0.0.0",
  },
  storage: {
    rootDir: ".",
    skipHiddenByDefault: false,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  listing: {
    defaultLimit: 25,
    maxLimit: 1000,
  },
  walk: {
    maxDepth: 32,
    maxEntries: 100_000,
    timeBudgetMs: 10_000,
  },
  uploads: {
    maxBytes: 10 * 1024 * 1024 * 1024,
    createMissingDirectories: true,
  },
  thumbnails: {
    width: 320,
    maxEntries: 500,
    maxBytes: 64 * 1024 * 1024,
    failureTtlMs: 30_000,
    videoSeekSeconds: 5,
    ffmpegPath: "ffmpeg",
    timeoutMs: 20_000,
  },
  mutations: {
    allowCrossDeviceCopy: false,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

const port = z.number().int().min(1).max(65535);

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: port.default(DEFAULTS.server.port),
      host: z.string().min(1).default(DEFAULTS.server.host),
    })
    .default(DEFAULTS.server),
  storage: z
    .object({
      rootDir: z
        .string()
        .min(1)
        .default(DEFAULTS.storage.rootDir)
        .describe("Directory exposed to clients; every request is confined to it"),
      skipHiddenByDefault: z
        .boolean()
        .default(DEFAULTS.storage.skipHiddenByDefault),
    })
    .default(DEFAULTS.storage),
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  listing: z
    .object({
      defaultLimit: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.listing.defaultLimit),
      maxLimit: z.number().int().positive().default(DEFAULTS.listing.maxLimit),
    })
    .default(DEFAULTS.listing),
  walk: z
    .object({
      maxDepth: z.number().int().min(1).default(DEFAULTS.walk.maxDepth),
      maxEntries: z.number().int().min(1).default(DEFAULTS.walk.maxEntries),
      timeBudgetMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.walk.timeBudgetMs),
    })
    .default(DEFAULTS.walk),
  uploads: z
    .object({
      maxBytes: z.number().int().positive().default(DEFAULTS.uploads.maxBytes),
      createMissingDirectories: z
        .boolean()
        .default(DEFAULTS.uploads.createMissingDirectories),
    })
    .default(DEFAULTS.uploads),
  thumbnails: z
    .object({
      width: z.number().int().min(16).max(4096).default(DEFAULTS.thumbnails.width),
      maxEntries: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.thumbnails.maxEntries),
      maxBytes: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.thumbnails.maxBytes),
      failureTtlMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.thumbnails.failureTtlMs),
      videoSeekSeconds: z
        .number()
        .min(0)
        .default(DEFAULTS.thumbnails.videoSeekSeconds),
      ffmpegPath: z.string().min(1).default(DEFAULTS.thumbnails.ffmpegPath),
      timeoutMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.thumbnails.timeoutMs),
    })
    .default(DEFAULTS.thumbnails),
  mutations: z
    .object({
      allowCrossDeviceCopy: z
        .boolean()
        .default(DEFAULTS.mutations.allowCrossDeviceCopy)
        .describe("Fall back to copy + delete when a move crosses volumes"),
    })
    .default(DEFAULTS.mutations),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type WalkConfig = ServerConfig["walk"];
export type ThumbnailConfig = ServerConfig["thumbnails"];
