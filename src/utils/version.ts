/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup.
 */
import type { Nullable } from "../types/index.js";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

// Cached package version.
let cachedPackageVersion: Nullable<string> = null;

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0"), or "0.0.0" if package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    // This file is in src/utils/ or dist/utils/, and package.json is in the project root.
    const packageJson: unknown = JSON.parse(readFileSync(resolve(__dirname, "../../package.json"), "utf-8"));

    if(packageJson && (typeof packageJson === "object") && ("version" in packageJson) && (typeof packageJson.version === "string")) {

      cachedPackageVersion = packageJson.version;

      return cachedPackageVersion;
    }
  } catch {

    // Fall through to the placeholder version.
  }

  return "0.0.0";
}
