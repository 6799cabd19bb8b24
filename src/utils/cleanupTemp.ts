/**
 * Cleanup utility for temporary download directories
 * Each delivery owns one directory; stale ones from crashed runs are swept on a schedule.
 */

import { mkdtemp, readdir, rm, stat } from "fs/promises";
import path from "path";
import os from "os";

export const TEMP_PREFIX = "media-fetch-bot-";

export interface ScopedTempDir {
  path: string;
  /** Removes the directory recursively. Failures are logged, never thrown. */
  dispose(): Promise<void>;
}

/**
 * Creates a uniquely named directory under `baseDir` (OS temp dir by default).
 */
export async function createScopedTempDir(baseDir: string = os.tmpdir()): Promise<ScopedTempDir> {
  const dir = await mkdtemp(path.join(baseDir, TEMP_PREFIX));

  return {
    path: dir,
    dispose: () => removeDirQuietly(dir),
  };
}

export async function removeDirQuietly(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    console.warn(`[cleanup] Failed to remove ${dir}:`, error);
  }
}

/**
 * Removes leftover download directories older than maxAgeHours.
 * Returns how many were removed.
 */
export async function sweepStaleTempDirs(
  maxAgeHours: number,
  baseDir: string = os.tmpdir()
): Promise<number> {
  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  let removedDirs = 0;

  let entries: string[];
  try {
    entries = await readdir(baseDir);
  } catch (error) {
    console.error(`[cleanup] Error scanning ${baseDir}:`, error);
    return 0;
  }

  for (const name of entries) {
    if (!name.startsWith(TEMP_PREFIX)) continue;

    const dir = path.join(baseDir, name);
    try {
      const stats = await stat(dir);
      if (!stats.isDirectory()) continue;

      const ageMs = now - stats.mtimeMs;
      if (ageMs > maxAgeMs) {
        await rm(dir, { recursive: true, force: true });
        removedDirs++;
        console.log(`[cleanup] Removed stale temp directory: ${name} (${(ageMs / 3600000).toFixed(1)}h old)`);
      }
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${name}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${removedDirs} stale directories`);
  return removedDirs;
}
