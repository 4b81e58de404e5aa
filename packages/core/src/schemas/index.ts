export {
  DEFAULTS,
  LogLevel,
  ServerConfigSchema,
  type ServerConfig,
  type LoggingConfig,
  type WalkConfig,
  type ThumbnailConfig,
} from "./server-config.js";
