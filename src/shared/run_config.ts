/**
 * Run Configuration Module
 *
 * Controls how the retention window is anchored for a run:
 * - run_time:  window measured back from the instant the run started.
 * - data_max:  window measured back from the latest activity date a source holds.
 *
 * A RunContext is built once at process start and handed to every task.
 */

import path from "path";
import type { Logger } from "./logger.js";
import type { RetentionAnchor, SourceId } from "./types.js";

/** Config file names under the config directory. */
export const SOURCE_CONFIG_FILES: Readonly<Record<SourceId, string>> = {
  call: "call.json",
  edetail: "edetail.json",
  events: "events.json",
  reach: "reach.json",
};

export const CONSOLIDATE_CONFIG_FILE = "consolidate.json";

export const LOG_FILE_NAME = "pipeline.log";

export interface RunContext {
  /** Project root; relative paths in config files resolve against it. */
  rootDir: string;
  configDir: string;
  anchor: RetentionAnchor;
  /** Captured once at run start (or pinned by --reference). */
  referenceInstant: Date;
  logger: Logger;
}

/**
 * Parse the retention anchor from CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Defaults to "run_time" when neither is provided.
 */
export function parseRetentionAnchor(cliArg?: string, envVar?: string): RetentionAnchor {
  const raw = (cliArg ?? envVar ?? "run_time").toLowerCase().replace(/-/g, "_");
  if (raw === "data_max") return "data_max";
  return "run_time";
}

/**
 * Parse a pinned reference date (YYYY-MM-DD) into a UTC instant at midnight.
 * Returns null for anything that is not a real calendar date.
 */
export function parseReferenceInstant(value: string): Date | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!m) return null;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const instant = new Date(Date.UTC(year, month - 1, day));
  if (instant.getUTCMonth() !== month - 1 || instant.getUTCDate() !== day) return null;
  return instant;
}

export function createRunContext(params: {
  rootDir: string;
  logger: Logger;
  anchor?: RetentionAnchor;
  referenceInstant?: Date;
  configDir?: string;
}): RunContext {
  const rootDir = path.resolve(params.rootDir);
  return {
    rootDir,
    configDir: params.configDir ?? path.join(rootDir, "config"),
    anchor: params.anchor ?? "run_time",
    referenceInstant: params.referenceInstant ?? new Date(),
    logger: params.logger,
  };
}

/** Resolve a path from a config file against the run's root directory. */
export function resolveFromRoot(ctx: RunContext, p: string): string {
  return path.isAbsolute(p) ? p : path.join(ctx.rootDir, p);
}

export function configPathFor(ctx: Pick<RunContext, "configDir">, source: SourceId): string {
  return path.join(ctx.configDir, SOURCE_CONFIG_FILES[source]);
}
