/**
 * CONSOLIDATE Task: merge every source's records into the unified dataset.
 */

import path from "path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";

import { CanonicalEngagementSchema } from "../../packs/canonical_schemas.js";
import { consolidate } from "../../packs/consolidator.js";
import { loadConsolidateConfig, writeCanonicalCsv } from "../../packs/loader.js";
import { CONSOLIDATE_CONFIG_FILE, resolveFromRoot } from "../../shared/run_config.js";
import { SOURCE_ORDER } from "../../shared/types.js";
import type { CanonicalEngagement, SourceId } from "../../shared/types.js";
import type { TaskHandler, TaskStore } from "../types.js";

const EngagementsSchema = z.array(CanonicalEngagementSchema);

/** Records each completed source published; sources that never ran are left out. */
export function collectSourceRecords(
  store: TaskStore,
): Partial<Record<SourceId, readonly CanonicalEngagement[]>> {
  const parts: Partial<Record<SourceId, readonly CanonicalEngagement[]>> = {};
  for (const source of SOURCE_ORDER) {
    if (store.has("engagements", source)) {
      parts[source] = EngagementsSchema.parse(store.get("engagements", source));
    }
  }
  return parts;
}

export const handleConsolidate: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const logger = ctx.logger.child("pipeline.consolidate");

  const configPath = path.join(ctx.configDir, CONSOLIDATE_CONFIG_FILE);
  const config = loadConsolidateConfig(configPath);

  const unified = consolidate(collectSourceRecords(store));
  const counts = SOURCE_ORDER.map((s) => `${s}=${unified.sourceCounts[s]}`).join(", ");
  logger.info(`Consolidated ${unified.records.length} records (${counts})`);

  const outputPath = resolveFromRoot(ctx, config.output.csv);
  const fileHash = writeCanonicalCsv(outputPath, unified.records);
  logger.info(`Saved concatenated HCP output to ${outputPath}`);

  const t1 = new Date();
  return {
    taskType: input.taskType,
    taskId: input.taskId,
    correlationId: input.correlationId,
    producedRefs: [
      store.set("unified_dataset", "unified", unified),
      { kind: "output_file", id: uuidv4(), hash: fileHash, path: outputPath },
    ],
    rowCount: unified.records.length,
    timing: { startedAt: t0, completedAt: t1, durationMs: t1.getTime() - t0.getTime() },
    status: "success",
  };
};
