/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * deviceId.test.ts: Tests for HDHomeRun DeviceID generation.
 */
import { completeDeviceId, generateDeviceId, validateDeviceId } from "../../hdhr/deviceId.js";
import { describe, expect, test } from "@jest/globals";

describe("HDHomeRun DeviceID", () => {

  test("completes a prefix with the byte that zeroes the checksum", () => {

    expect(completeDeviceId("123456")).toBe("12345620");
    expect(completeDeviceId("ABCDEF")).toBe(completeDeviceId("abcdef"));
  });

  test("validates format and checksum", () => {

    expect(validateDeviceId("12345620")).toBe(true);
    expect(validateDeviceId("12345621")).toBe(false);
    expect(validateDeviceId("1234562")).toBe(false);
    expect(validateDeviceId("1234562g")).toBe(false);
  });

  test("generated ids are always valid", () => {

    for(let i = 0; i < 20; i++) {

      const deviceId = generateDeviceId();

      expect(deviceId).toMatch(/^[0-9a-f]{8}$/);
      expect(validateDeviceId(deviceId)).toBe(true);
    }
  });
});
