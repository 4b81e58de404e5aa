import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_HOME_PATH = join(homedir(), ".filedock");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_HOME_PATH, "config.json");
