/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: HDHomeRun device identity for TwitchTuner.
 */
import { LOG, formatError } from "../utils/index.js";
import { generateDeviceId, validateDeviceId } from "./deviceId.js";
import { loadUserConfig, saveUserConfig, setNestedValue } from "../config/userConfig.js";
import type { HdhrConfig } from "../types/index.js";

/*
 * HDHOMERUN EMULATION
 *
 * The HDHomeRun endpoints themselves live in discover.ts and are mounted on the main HTTP server. This module makes sure the tuner has a stable DeviceID before
 * they are served: Plex remembers tuners by DeviceID, so a fresh one on every start would appear as a new device each time.
 */

/**
 * Generates a DeviceID when none is configured or the configured one fails its checksum, and saves it to config.json so it survives restarts. Plex silently rejects
 * tuners with invalid DeviceIDs, so a hand-edited typo is replaced rather than served.
 * @param hdhr - The tuner settings. deviceId is updated in place.
 * @param configPath - Optional config.json path. Defaults to the data directory.
 * @returns The DeviceID in use.
 */
export async function ensureDeviceId(hdhr: HdhrConfig, configPath?: string): Promise<string> {

  if(hdhr.deviceId && validateDeviceId(hdhr.deviceId)) {

    return hdhr.deviceId;
  }

  if(hdhr.deviceId) {

    LOG.warn("HDHomeRun DeviceID '%s' has an invalid checksum. Generating a new one.", hdhr.deviceId.toUpperCase());
  }

  hdhr.deviceId = generateDeviceId();

  LOG.info("Generated HDHomeRun DeviceID: %s.", hdhr.deviceId.toUpperCase());

  // Load the current file and change only the deviceId so other settings are preserved. A file we could not parse is left alone.
  try {

    const result = await loadUserConfig(configPath);

    if(!result.parseError) {

      setNestedValue(result.config, "hdhr.deviceId", hdhr.deviceId);

      await saveUserConfig(result.config, configPath);
    }
  } catch(error) {

    LOG.warn("Failed to persist HDHomeRun DeviceID: %s. A new ID will be generated on next restart.", formatError(error));
  }

  return hdhr.deviceId;
}
