import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { LOG_FILE } from "./logger.js";

export const CONFIG_DIR = join(homedir(), ".command-host");
export const SETTINGS_FILENAME = "settings.json";

export interface HostSettings {
  /** Colour help and error output. */
  color: boolean;
  /** Write the dispatch trace to `logFile`. */
  debug: boolean;
  logFile: string;
}

export const DEFAULT_SETTINGS: HostSettings = {
  color: true,
  debug: false,
  logFile: LOG_FILE,
};

function pickSettings(loaded: unknown): Partial<HostSettings> {
  if (typeof loaded !== "object" || loaded === null) {
    return {};
  }

  const picked: Partial<HostSettings> = {};
  if ("color" in loaded && typeof loaded.color === "boolean") {
    picked.color = loaded.color;
  }
  if ("debug" in loaded && typeof loaded.debug === "boolean") {
    picked.debug = loaded.debug;
  }
  if ("logFile" in loaded && typeof loaded.logFile === "string" && loaded.logFile !== "") {
    picked.logFile = loaded.logFile;
  }
  return picked;
}

function readSettingsFile(configDir: string): Partial<HostSettings> {
  const file = join(configDir, SETTINGS_FILENAME);
  if (!existsSync(file)) {
    return {};
  }

  try {
    const content = readFileSync(file, "utf-8");
    return pickSettings(JSON.parse(content));
  } catch {
    return {};
  }
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<HostSettings> {
  const overrides: Partial<HostSettings> = {};

  const debug = env.COMMAND_HOST_DEBUG?.toLowerCase();
  if (debug !== undefined && debug !== "") {
    overrides.debug = debug === "1" || debug === "true";
  }
  if (env.COMMAND_HOST_LOG_FILE) {
    overrides.logFile = env.COMMAND_HOST_LOG_FILE;
  }
  if (env.NO_COLOR) {
    overrides.color = false;
  }
  return overrides;
}

/**
 * Defaults, then `settings.json` from the config folder, then environment.
 * A missing or malformed file leaves the defaults in place.
 */
export function loadSettings(configDir: string = CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): HostSettings {
  return { ...DEFAULT_SETTINGS, ...readSettingsFile(configDir), ...envOverrides(env) };
}
