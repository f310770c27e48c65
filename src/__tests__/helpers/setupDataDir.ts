/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * setupDataDir.ts: Jest setup that resolves the data directory before each suite, as index.ts does at startup.
 */
import { initializeDataDir } from "../../config/paths.js";
import os from "node:os";
import path from "node:path";

initializeDataDir(path.join(os.tmpdir(), "twitchtuner-test"));
