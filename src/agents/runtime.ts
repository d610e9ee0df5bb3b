/**
 * PipelineRuntime: Orchestrates task execution for one run.
 *
 * Creates a fresh InMemoryTaskStore per run, executes tasks in
 * topological order, collects results, and halts on the first failure.
 */

import { v4 as uuidv4 } from "uuid";
import { InMemoryTaskStore } from "./store.js";
import { TASK_DEFINITIONS, getExecutionOrder, getTaskDefinition } from "./registry.js";
import { describeError } from "../shared/errors.js";
import type { RunContext } from "../shared/run_config.js";
import type {
  TaskDefinition,
  TaskInputBundle,
  TaskResult,
  PipelineTaskType,
  PipelineRunResult,
} from "./types.js";

export class PipelineRuntime {
  private ctx: RunContext;
  private definitions: TaskDefinition[];

  constructor(ctx: RunContext, definitions: TaskDefinition[] = TASK_DEFINITIONS) {
    this.ctx = ctx;
    this.definitions = definitions;
  }

  async execute(): Promise<PipelineRunResult> {
    const correlationId = uuidv4();
    const store = new InMemoryTaskStore();
    const taskResults = new Map<PipelineTaskType, TaskResult>();
    const logger = this.ctx.logger.child("runtime");
    const t0 = Date.now();

    logger.info(
      `Starting pipeline execution (reference ${this.ctx.referenceInstant.toISOString()}, anchor ${this.ctx.anchor})`,
    );

    const executionOrder = getExecutionOrder(this.definitions);

    for (const taskType of executionOrder) {
      const def = getTaskDefinition(taskType, this.definitions);
      const name = taskType.toLowerCase();

      const inputBundle: TaskInputBundle = {
        taskType,
        taskId: uuidv4(),
        correlationId,
      };

      const startedAt = new Date();
      try {
        const output = await def.handler(inputBundle, store, this.ctx);
        taskResults.set(taskType, { status: "success", output });
        logger.info(`Completed ${name} pipeline`);
      } catch (err) {
        const error = describeError(err);
        const completedAt = new Date();
        logger.error(`Failed to run ${name} pipeline: ${error}`);
        taskResults.set(taskType, {
          status: "failed",
          error,
          output: {
            ...inputBundle,
            producedRefs: [],
            rowCount: 0,
            timing: {
              startedAt,
              completedAt,
              durationMs: completedAt.getTime() - startedAt.getTime(),
            },
            status: "failed",
            errors: [error],
          },
        });
        return {
          correlationId,
          taskResults,
          store,
          totalDurationMs: Date.now() - t0,
          success: false,
        };
      }
    }

    return {
      correlationId,
      taskResults,
      store,
      totalDurationMs: Date.now() - t0,
      success: true,
    };
  }
}
