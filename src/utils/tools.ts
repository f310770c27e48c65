/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * tools.ts: Availability checks for the external executables TwitchTuner shells out to.
 */
import { spawn } from "node:child_process";

/*
 * EXECUTABLE PROBES
 *
 * The extractor (streamlink) and the fetcher (ffmpeg) are looked up on the system PATH or at the configured location. We probe each once at startup by running it
 * with a version flag, and cache the answer so the health endpoint does not spawn a process per request. A missing extractor does not stop the server: the tuner
 * documents still work, and the health endpoint reports the problem.
 */

// Cached probe results, keyed by the executable as configured.
const probeCache = new Map<string, boolean>();

/**
 * Runs an executable with the given arguments and reports whether it exited cleanly.
 * @param command - Executable name or path.
 * @param args - Arguments for the probe. Defaults to ["--version"], which both streamlink and ffmpeg ("-version") accept in some form.
 * @returns Promise resolving to true if the process exited with code 0.
 */
export async function checkExecutable(command: string, args: string[] = ["--version"]): Promise<boolean> {

  return new Promise((resolve) => {

    const child = spawn(command, args, {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    child.on("error", () => {

      resolve(false);
    });

    child.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Probes an executable once and caches the result. Later calls return the cached answer.
 * @param command - Executable name or path.
 * @param args - Probe arguments.
 * @returns Promise resolving to the cached availability.
 */
export async function isExecutableAvailable(command: string, args?: string[]): Promise<boolean> {

  const cached = probeCache.get(command);

  if(cached !== undefined) {

    return cached;
  }

  const available = await checkExecutable(command, args);

  probeCache.set(command, available);

  return available;
}
