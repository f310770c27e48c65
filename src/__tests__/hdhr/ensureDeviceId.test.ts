/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ensureDeviceId.test.ts: Tests for DeviceID persistence.
 */
import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";
import type { HdhrConfig } from "../../types/index.js";
import { ensureDeviceId } from "../../hdhr/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { validateDeviceId } from "../../hdhr/deviceId.js";

describe("ensureDeviceId", () => {

  let configPath: string;
  let dir: string;

  beforeEach(() => {

    dir = fs.mkdtempSync(path.join(os.tmpdir(), "twitchtuner-hdhr-"));
    configPath = path.join(dir, "config.json");
  });

  afterEach(() => {

    fs.rmSync(dir, { force: true, recursive: true });
  });

  test("keeps a valid DeviceID and writes nothing", async () => {

    const hdhr: HdhrConfig = { deviceId: "12345620", friendlyName: "Twitch Tuner", tunerCount: 5 };

    expect(await ensureDeviceId(hdhr, configPath)).toBe("12345620");
    expect(fs.existsSync(configPath)).toBe(false);
  });

  test("replaces an invalid DeviceID and saves it next to the other settings", async () => {

    const hdhr: HdhrConfig = { deviceId: "12345621", friendlyName: "Twitch Tuner", tunerCount: 5 };

    fs.writeFileSync(configPath, JSON.stringify({ server: { port: 6000 } }));

    const deviceId = await ensureDeviceId(hdhr, configPath);
    const saved: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));

    expect(validateDeviceId(deviceId)).toBe(true);
    expect(hdhr.deviceId).toBe(deviceId);
    expect(saved).toEqual({ hdhr: { deviceId }, server: { port: 6000 } });
  });

  test("leaves an unparseable config file untouched", async () => {

    const hdhr: HdhrConfig = { deviceId: "", friendlyName: "Twitch Tuner", tunerCount: 5 };

    fs.writeFileSync(configPath, "{ broken");

    expect(validateDeviceId(await ensureDeviceId(hdhr, configPath))).toBe(true);
    expect(fs.readFileSync(configPath, "utf8")).toBe("{ broken");
  });
});
