#!/usr/bin/env node
/**
 * CLI: pipeline:run
 *
 * Usage: npm run pipeline:run -- [--root <dir>] [--anchor run_time|data_max] [--reference YYYY-MM-DD]
 *
 * Cleans outputs/ (keeping pipeline.log), then runs call → edetail →
 * events → reach → consolidate, stopping at the first failure.
 * Exit code 1 when any step failed.
 */

import path from "path";
import { fileURLToPath } from "url";

import { PipelineRuntime } from "../agents/runtime.js";
import { checkSourceInputs } from "../packs/loader.js";
import { RunLogger } from "../shared/logger.js";
import {
  LOG_FILE_NAME,
  createRunContext,
  parseReferenceInstant,
  parseRetentionAnchor,
} from "../shared/run_config.js";
import { cleanOutputDir } from "./out_clean.js";

export interface CliArgs {
  root: string;
  anchor?: string;
  reference?: string;
  checkInputs: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { root: process.cwd(), checkInputs: false };
  for (let i = 0; i < argv.length; i++) {
    const next = argv[i + 1];
    switch (argv[i]) {
      case "--root":
        if (next !== undefined) args.root = next;
        i++;
        break;
      case "--anchor":
        args.anchor = next;
        i++;
        break;
      case "--reference":
        args.reference = next;
        i++;
        break;
      case "--check-inputs":
        args.checkInputs = true;
        break;
    }
  }
  return args;
}

/**
 * Run every pipeline once. Returns the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const rootDir = path.resolve(args.root);

  let referenceInstant: Date | undefined;
  if (args.reference !== undefined) {
    const parsed = parseReferenceInstant(args.reference);
    if (!parsed) {
      console.error(`Invalid --reference "${args.reference}", expected YYYY-MM-DD`);
      return 1;
    }
    referenceInstant = parsed;
  }

  if (args.checkInputs) {
    const statuses = checkSourceInputs(rootDir, path.join(rootDir, "config"));
    for (const s of statuses) {
      console.log(`  ${s.exists ? "✓" : "✗"} ${s.source}: ${s.inputPath ?? s.error}`);
    }
    return statuses.every((s) => s.exists) ? 0 : 1;
  }

  const outputDir = path.join(rootDir, "outputs");
  cleanOutputDir(outputDir, { preserve: [LOG_FILE_NAME] });

  const logger = new RunLogger("main", path.join(outputDir, LOG_FILE_NAME));
  try {
    const ctx = createRunContext({
      rootDir,
      logger,
      anchor: parseRetentionAnchor(args.anchor, process.env.RETENTION_ANCHOR),
      referenceInstant,
    });
    const result = await new PipelineRuntime(ctx).execute();
    logger.info(
      `Run ${result.correlationId} ${result.success ? "succeeded" : "failed"} in ${result.totalDurationMs}ms`,
    );
    return result.success ? 0 : 1;
  } finally {
    logger.close();
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) ===
    path.resolve(fileURLToPath(import.meta.url))
) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`Pipeline run aborted: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    },
  );
}
