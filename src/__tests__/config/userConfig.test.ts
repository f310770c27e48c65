/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.test.ts: Tests for configuration merging and environment parsing.
 */
import { type SettingMetadata, forEachSetting, loadUserConfig, mergeConfiguration, parseEnvValue } from "../../config/userConfig.js";
import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

function settingFor(settingPath: string): SettingMetadata {

  let found: SettingMetadata | undefined;

  forEachSetting((setting) => {

    if(setting.path === settingPath) {

      found = setting;
    }
  });

  if(!found) {

    throw new Error("Unknown setting " + settingPath);
  }

  return found;
}

describe("parseEnvValue", () => {

  test("parses booleans leniently", () => {

    expect(parseEnvValue("YES", settingFor("recording.enabled"))).toBe(true);
    expect(parseEnvValue("1", settingFor("recording.enabled"))).toBe(true);
    expect(parseEnvValue("off", settingFor("recording.enabled"))).toBe(false);
  });

  test("parses numbers and rejects garbage", () => {

    expect(parseEnvValue(" 42 ", settingFor("recording.retentionDays"))).toBe(42);
    expect(parseEnvValue("", settingFor("server.port"))).toBeUndefined();
    expect(parseEnvValue("eighty", settingFor("server.port"))).toBeUndefined();
  });

  test("an empty value clears a nullable setting", () => {

    expect(parseEnvValue("", settingFor("recording.path"))).toBeNull();
    expect(parseEnvValue("/srv/recordings", settingFor("recording.path"))).toBe("/srv/recordings");
  });
});

describe("mergeConfiguration", () => {

  test("environment beats config.json, which beats the defaults", () => {

    const config = mergeConfiguration({ server: { host: "127.0.0.1", port: 6000 } }, { PORT: "7000", STREAM_QUALITY: "720p" });

    expect(config.server).toEqual({ baseUrl: null, host: "127.0.0.1", port: 7000 });
    expect(config.streaming.quality).toBe("720p");
    expect(config.recording.retentionDays).toBe(7);
  });

  test("values of the wrong type are ignored", () => {

    const config = mergeConfiguration({ hdhr: { tunerCount: "many" }, streaming: { quality: 5 } }, { PORT: "abc", RECORDING_ENABLED: "no" });

    expect(config.hdhr.tunerCount).toBe(5);
    expect(config.streaming.quality).toBe("1080p60,1080p,720p60,720p,best");
    expect(config.server.port).toBe(5000);
    expect(config.recording.enabled).toBe(false);
  });

  test("credentials and paths come from the environment", () => {

    const config = mergeConfiguration({ recording: { path: "/from/file" } }, { CLIENT_ID: "test-client", CLIENT_SECRET: "test-secret", RECORDING_PATH: "" });

    expect(config.twitch.clientId).toBe("test-client");
    expect(config.twitch.clientSecret).toBe("test-secret");
    expect(config.recording.path).toBeNull();
  });
});

describe("loadUserConfig", () => {

  let dir: string;

  beforeEach(() => {

    dir = fs.mkdtempSync(path.join(os.tmpdir(), "twitchtuner-config-"));
  });

  afterEach(() => {

    fs.rmSync(dir, { force: true, recursive: true });
  });

  test("reads a JSON object", async () => {

    const file = path.join(dir, "config.json");

    fs.writeFileSync(file, "{ \"server\": { \"port\": 6000 } }");

    expect(await loadUserConfig(file)).toEqual({ config: { server: { port: 6000 } }, parseError: false });
  });

  test("a missing file is an empty configuration", async () => {

    expect(await loadUserConfig(path.join(dir, "missing.json"))).toEqual({ config: {}, parseError: false });
  });

  test("a file that is not a JSON object is a parse error", async () => {

    const file = path.join(dir, "config.json");

    fs.writeFileSync(file, "[1, 2]");

    expect(await loadUserConfig(file)).toEqual({ config: {}, parseError: true, parseErrorMessage: "the top level must be a JSON object" });

    fs.writeFileSync(file, "{ nope");

    const result = await loadUserConfig(file);

    expect(result.parseError).toBe(true);
    expect(result.config).toEqual({});
  });
});
