/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for TwitchTuner.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for all filesystem paths used by TwitchTuner. The data directory is resolved once at startup via initializeDataDir(),
 * before config.json is loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (TWITCHTUNER_DATA_DIR)
 *   3. Default (~/.twitchtuner)
 *
 * The log file, the subscriptions file, and the recordings root are stored in Config and fall back to locations inside the data directory.
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. Must be called at startup before any config loading or path resolution. May
 * be called a second time with a CLI flag to override the initial resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.TWITCHTUNER_DATA_DIR;

  if(cliDataDir) {

    // CLI flag is already validated by requireAbsolutePath() in index.ts.
    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      // eslint-disable-next-line no-console
      console.error("Error: TWITCHTUNER_DATA_DIR must be an absolute path, got: " + envDataDir);

      process.exit(1);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".twitchtuner");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the subscriptions file path. When config.twitch.channelsFile is set, that path is used directly.
 * @param config - The application configuration.
 * @returns The absolute path to the subscriptions file.
 */
export function getChannelsFilePath(config: Config): string {

  return config.twitch.channelsFile ?? path.join(getDataDir(), "channels.json");
}

/**
 * Returns the recordings root. When config.recording.path is set, that path is used directly.
 * @param config - The application configuration.
 * @returns The absolute path to the recordings directory.
 */
export function getRecordingsDir(config: Config): string {

  return config.recording.path ?? path.join(getDataDir(), "recordings");
}

/**
 * Returns the log file path. When config.paths.logFile is set, that absolute path is used directly. Otherwise, the default location inside the data directory is used.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "twitchtuner.log");
}
