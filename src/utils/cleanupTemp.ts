/**
 * Cleanup utility for job scratch workspaces
 * Runs on worker startup to clear directories left behind by crashes/OOM kills.
 */

import fs from "fs";
import path from "path";

/**
 * Removes per-job directories under `workRoot` older than maxAgeHours.
 * Returns the number of directories removed.
 */
export async function cleanupStaleWorkspaces(workRoot: string, maxAgeHours: number = 2): Promise<number> {
  if (!fs.existsSync(workRoot)) {
    console.log("[cleanup] No work directory found, nothing to clean");
    return 0;
  }

  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  let removedDirs = 0;

  for (const entry of await fs.promises.readdir(workRoot, { withFileTypes: true })) {
    if (!entry.isDirectory()) {
      continue;
    }
    const jobDir = path.join(workRoot, entry.name);
    try {
      const stats = await fs.promises.stat(jobDir);
      const ageMs = now - stats.mtimeMs;
      if (ageMs > maxAgeMs) {
        await fs.promises.rm(jobDir, { recursive: true, force: true });
        removedDirs++;
        console.log(`[cleanup] Removed stale workspace: ${entry.name} (${(ageMs / 3600000).toFixed(1)}h old)`);
      }
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry.name}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${removedDirs} stale workspaces`);
  return removedDirs;
}

/**
 * Get disk usage for the work directory
 */
export function getWorkspaceDiskUsage(workRoot: string): { usedMB: number; files: number } {
  if (!fs.existsSync(workRoot)) {
    return { usedMB: 0, files: 0 };
  }

  let totalBytes = 0;
  let totalFiles = 0;

  try {
    for (const jobId of fs.readdirSync(workRoot)) {
      const jobDir = path.join(workRoot, jobId);
      if (!fs.statSync(jobDir).isDirectory()) {
        continue;
      }
      for (const file of fs.readdirSync(jobDir)) {
        totalBytes += fs.statSync(path.join(jobDir, file)).size;
        totalFiles++;
      }
    }
  } catch (err) {
    console.error("[cleanup] Error calculating disk usage:", err);
  }

  return {
    usedMB: totalBytes / (1024 * 1024),
    files: totalFiles,
  };
}
