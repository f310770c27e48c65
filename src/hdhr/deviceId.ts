/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * deviceId.ts: HDHomeRun DeviceID generation for TwitchTuner.
 */
import crypto from "node:crypto";

/*
 * HDHOMERUN DEVICE ID
 *
 * HDHomeRun devices are identified by eight hex digits with a checksum from libhdhomerun: nibbles at even positions (counting from the most significant) pass
 * through a lookup table, nibbles at odd positions are used as they are, and XORing all eight must give zero. Plex checks this when it adds a tuner.
 *
 * A new ID is a random six digit prefix followed by the one final byte that zeroes the checksum.
 */

const DEVICE_ID_PATTERN = /^[0-9a-fA-F]{8}$/;

// libhdhomerun checksum lookup table for even-position nibbles.
const DEVICEID_LOOKUP = [

  0xA, 0x5, 0xF, 0x6, 0x7, 0xC, 0x1, 0xB,
  0x9, 0x2, 0x8, 0xD, 0x4, 0x3, 0xE, 0x0
];

/**
 * XORs a run of hex digits into a checksum.
 * @param hex - Hex digits, the first of which is at an even position.
 * @returns The checksum contribution of the digits.
 */
function checksumOf(hex: string): number {

  let checksum = 0;

  for(const [ index, digit ] of Array.from(hex).entries()) {

    const nibble = parseInt(digit, 16);

    checksum ^= ((index % 2) === 0) ? DEVICEID_LOOKUP[nibble] : nibble;
  }

  return checksum;
}

/**
 * Validates an HDHomeRun DeviceID.
 * @param deviceId - Eight hex digits.
 * @returns True if the format and checksum are valid.
 */
export function validateDeviceId(deviceId: string): boolean {

  return DEVICE_ID_PATTERN.test(deviceId) && (checksumOf(deviceId) === 0);
}

/**
 * Appends the final byte that completes a six digit prefix. Its even digit is the one whose lookup value cancels the prefix checksum, and its odd digit is zero.
 * @param prefix - Six hex digits.
 * @returns The full lowercase DeviceID.
 */
export function completeDeviceId(prefix: string): string {

  const highNibble = DEVICEID_LOOKUP.indexOf(checksumOf(prefix));

  return prefix.toLowerCase() + highNibble.toString(16) + "0";
}

/**
 * Generates a valid HDHomeRun DeviceID.
 * @returns Eight lowercase hex digits.
 */
export function generateDeviceId(): string {

  return completeDeviceId(crypto.randomBytes(3).toString("hex"));
}
