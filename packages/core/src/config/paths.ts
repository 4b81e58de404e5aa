import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_HOME_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the state directory holding config.json (or the default) to an
 * absolute path.
 */
export function resolveHomePath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_HOME_PATH));
}

/** Resolves the served root directory relative to the working directory. */
export function resolveServedRoot(rootDir: string): string {
  return resolve(expandHomePath(rootDir));
}
