/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * retention.ts: Age-based cleanup of the recordings directory.
 */
import { LOG, formatError, getErrorCode } from "../utils/index.js";
import { promises as fsPromises } from "node:fs";
import path from "node:path";

const { readdir, rmdir, stat, unlink } = fsPromises;

const DAY = 24 * 60 * 60 * 1000;

/**
 * What a cleanup pass removed.
 */
export interface RetentionResult {

  deletedFiles: string[];
  removedDirectories: string[];
}

/**
 * Deletes recordings older than the retention window and removes directories that the deletions left empty. Only paths under the root are ever touched, the root
 * itself is never removed, and files currently being written are skipped regardless of age.
 * @param root - The recordings root.
 * @param retentionDays - Maximum age in days. Zero or less disables cleanup.
 * @param now - The current time.
 * @param activePaths - Output paths of running recorders.
 * @returns The deleted files and removed directories.
 */
export async function cleanupRecordings(root: string, retentionDays: number, now: Date, activePaths: ReadonlySet<string> = new Set()): Promise<RetentionResult> {

  const result: RetentionResult = { deletedFiles: [], removedDirectories: [] };

  if(retentionDays <= 0) {

    return result;
  }

  const cutoff = now.getTime() - (retentionDays * DAY);
  const resolvedActive = new Set([...activePaths].map((entry) => path.resolve(entry)));

  try {

    await sweepDirectory(path.resolve(root), cutoff, resolvedActive, result, true);
  } catch(error) {

    // A recordings root that does not exist yet simply has nothing to clean.
    if(getErrorCode(error) !== "ENOENT") {

      throw error;
    }
  }

  if((result.deletedFiles.length > 0) || (result.removedDirectories.length > 0)) {

    LOG.info("Retention cleanup removed %s recording%s and %s empty director%s.", result.deletedFiles.length, (result.deletedFiles.length === 1) ? "" : "s",
      result.removedDirectories.length, (result.removedDirectories.length === 1) ? "y" : "ies");
  }

  return result;
}

/**
 * Cleans one directory, recursing depth first.
 * @returns True if this directory is empty afterwards because of deletions made here or below.
 */
async function sweepDirectory(directory: string, cutoff: number, active: ReadonlySet<string>, result: RetentionResult, isRoot: boolean): Promise<boolean> {

  const entries = await readdir(directory, { withFileTypes: true });
  let deletedHere = 0;
  let remaining = entries.length;

  for(const entry of entries) {

    const entryPath = path.join(directory, entry.name);

    try {

      if(entry.isDirectory()) {

        // eslint-disable-next-line no-await-in-loop
        if(await sweepDirectory(entryPath, cutoff, active, result, false)) {

          deletedHere++;
          remaining--;
        }

        continue;
      }

      if(!entry.isFile() || active.has(entryPath)) {

        continue;
      }

      // eslint-disable-next-line no-await-in-loop
      const stats = await stat(entryPath);

      if(stats.mtimeMs >= cutoff) {

        continue;
      }

      // eslint-disable-next-line no-await-in-loop
      await unlink(entryPath);

      result.deletedFiles.push(entryPath);
      LOG.debug("recording:retention", "Deleted %s.", entryPath);
      deletedHere++;
      remaining--;
    } catch(error) {

      LOG.warn("Retention cleanup could not process %s: %s.", entryPath, formatError(error));
    }
  }

  // Directories that were already empty are left alone. Only a directory emptied by this pass is removed.
  if(isRoot || (remaining > 0) || (deletedHere === 0)) {

    return false;
  }

  await rmdir(directory);

  result.removedDirectories.push(directory);
  LOG.debug("recording:retention", "Removed empty directory %s.", directory);

  return true;
}
