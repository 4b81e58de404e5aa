export {
  ThumbnailCache,
  type ThumbnailKey,
  type ThumbnailCacheOptions,
  type ThumbnailCacheStats,
} from "./cache.js";
export {
  createMediaThumbnailGenerator,
  extractVideoFrame,
  type ThumbnailGenerator,
  type ThumbnailSource,
  type MediaGeneratorOptions,
} from "./generator.js";
export {
  createThumbnailService,
  type Thumbnail,
  type ThumbnailService,
  type ThumbnailServiceDeps,
} from "./service.js";
