export { DEFAULT_HOME_PATH, DEFAULT_CONFIG_PATH } from "./defaults.js";
export {
  loadConfig,
  saveConfig,
  applyEnvOverrides,
  type LoadConfigOptions,
} from "./loader.js";
export { expandHomePath, resolveHomePath, resolveServedRoot } from "./paths.js";
