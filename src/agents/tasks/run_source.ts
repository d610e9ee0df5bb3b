/**
 * Source Tasks: CALL, EDETAIL, EVENTS, REACH.
 *
 * Load config → read raw table → map + retention → write the source CSV →
 * publish the records to the store for CONSOLIDATE.
 */

import { v4 as uuidv4 } from "uuid";

import { buildFilterConfig } from "../../packs/filters.js";
import { loadSourceConfig, readTable, writeCanonicalCsv } from "../../packs/loader.js";
import { runSourcePipeline } from "../../packs/pipeline.js";
import { configPathFor, resolveFromRoot } from "../../shared/run_config.js";
import type { SourceId } from "../../shared/types.js";
import type { TaskHandler } from "../types.js";

export function createSourceTask(source: SourceId): TaskHandler {
  return async (input, store, ctx) => {
    const t0 = new Date();
    const logger = ctx.logger.child(`pipeline.${source}`);

    const configPath = configPathFor(ctx, source);
    const config = loadSourceConfig(configPath);
    logger.info(`Running ${source} pipeline with config ${configPath}`);

    const sourcePath = resolveFromRoot(ctx, config.source.path);
    const table = readTable(sourcePath, source);
    const filter = buildFilterConfig(config.filters, ctx.referenceInstant);

    const result = runSourcePipeline(source, table.records, filter, {
      anchor: ctx.anchor,
      logger,
      columns: table.columns,
    });
    logger.info(
      `${source}: ${result.rawCount} raw, ${result.mappedCount} mapped, ` +
        `${result.records.length} kept (retaining from ${result.cutoff})`,
    );

    const outputPath = resolveFromRoot(ctx, config.output.csv);
    const fileHash = writeCanonicalCsv(outputPath, result.records);
    logger.info(`Saved ${source} output to ${outputPath}`);

    const t1 = new Date();
    return {
      taskType: input.taskType,
      taskId: input.taskId,
      correlationId: input.correlationId,
      producedRefs: [
        store.set("engagements", source, result.records),
        { kind: "output_file", id: uuidv4(), hash: fileHash, path: outputPath },
      ],
      rowCount: result.records.length,
      timing: { startedAt: t0, completedAt: t1, durationMs: t1.getTime() - t0.getTime() },
      status: "success",
    };
  };
}

export const handleCall = createSourceTask("call");
export const handleEdetail = createSourceTask("edetail");
export const handleEvents = createSourceTask("events");
export const handleReach = createSourceTask("reach");
