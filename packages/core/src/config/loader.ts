import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { errnoCode } from "../errors/fs.js";
import { resolveHomePath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  homePath?: string;
  /** Environment consulted for FILEDOCK_* overrides. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveHomePath(options?.homePath), "config.json")
  );
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    // A missing file means all defaults
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ServerConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return applyEnvOverrides(config, options?.env ?? process.env);
}

export async function saveConfig(
  config: ServerConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/**
 * Layers FILEDOCK_ROOT_DIR, FILEDOCK_PORT and FILEDOCK_LOG_LEVEL over a
 * loaded config. Overrides are never written back to disk.
 */
export function applyEnvOverrides(
  config: ServerConfig,
  env: NodeJS.ProcessEnv,
): ServerConfig {
  const rootDir = env.FILEDOCK_ROOT_DIR;
  const port = env.FILEDOCK_PORT;
  const level = env.FILEDOCK_LOG_LEVEL;

  if (!rootDir && !port && !level) {
    return config;
  }

  return ServerConfigSchema.parse({
    ...config,
    server: {
      ...config.server,
      ...(port ? { port: Number(port) } : {}),
    },
    storage: {
      ...config.storage,
      ...(rootDir ? { rootDir } : {}),
    },
    logging: {
      ...config.logging,
      ...(level ? { level } : {}),
    },
  });
}
