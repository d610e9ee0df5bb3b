#!/usr/bin/env tsx
/**
 * Output Cleanup Utility
 *
 * Removes generated files under outputs/ before a run, keeping the entries
 * named in `preserve` (pipeline.log by default).
 *
 * Usage:
 *   npm run out:clean
 */

import { existsSync, mkdirSync, readdirSync, rmSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { LOG_FILE_NAME } from "../shared/run_config.js";

export interface CleanOptions {
  /** Entry names left in place. */
  preserve?: readonly string[];
}

/**
 * Clean a target output directory: remove its contents (except preserved
 * entries), creating the directory when it does not exist.
 * Refuses any directory not named "outputs". Returns the removed entry names.
 */
export function cleanOutputDir(outDir: string, options: CleanOptions = {}): string[] {
  const resolved = path.resolve(outDir);
  const basename = path.basename(resolved);
  if (basename !== "outputs") {
    throw new Error(
      `Safety: cleanOutputDir refuses to clean "${resolved}": target must be named "outputs".`,
    );
  }

  if (!existsSync(resolved)) {
    mkdirSync(resolved, { recursive: true });
    return [];
  }

  const preserve = new Set(options.preserve ?? [LOG_FILE_NAME]);
  const removed: string[] = [];
  for (const entry of readdirSync(resolved)) {
    if (preserve.has(entry)) continue;
    rmSync(path.join(resolved, entry), { recursive: true, force: true });
    removed.push(entry);
  }
  return removed.sort();
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) ===
    path.resolve(fileURLToPath(import.meta.url))
) {
  const outDir = path.join(process.cwd(), "outputs");

  console.log(`Cleaning output directory: ${outDir}`);
  const removed = cleanOutputDir(outDir);
  console.log(`Done. Removed ${removed.length} entr${removed.length === 1 ? "y" : "ies"}.`);
}
