/**
 * Pipeline Task Types
 *
 * Each source run and the final consolidation is a task. Tasks hand results
 * to each other through typed references in an in-memory TaskStore that
 * lives for one run.
 */

import type { RunContext } from "../shared/run_config.js";

// ── Task Type Enum ─────────────────────────────────────────────────

export type PipelineTaskType = "CALL" | "EDETAIL" | "EVENTS" | "REACH" | "CONSOLIDATE";

// ── Store Slot Kinds ───────────────────────────────────────────────

export type ProducedRefKind = "engagements" | "unified_dataset" | "output_file";

// ── Reference & Bundle Types ───────────────────────────────────────

export interface ProducedRef {
  kind: ProducedRefKind;
  id: string;
  hash: string;
  path?: string;
}

export interface TaskInputBundle {
  taskType: PipelineTaskType;
  taskId: string;
  correlationId: string;
}

export interface TaskOutputBundle {
  taskType: PipelineTaskType;
  taskId: string;
  correlationId: string;
  producedRefs: ProducedRef[];
  rowCount: number;
  timing: {
    startedAt: Date;
    completedAt: Date;
    durationMs: number;
  };
  status: "success" | "failed";
  errors?: string[];
}

// ── Task Result ────────────────────────────────────────────────────

export type TaskResult =
  | { status: "success"; output: TaskOutputBundle }
  | { status: "failed"; output: TaskOutputBundle; error: string };

// ── TaskStore Interface ────────────────────────────────────────────

export interface TaskStore {
  set(kind: ProducedRefKind, id: string, value: unknown): ProducedRef;
  get(kind: ProducedRefKind, id: string): unknown;
  has(kind: ProducedRefKind, id: string): boolean;
  getRef(kind: ProducedRefKind, id: string): ProducedRef | undefined;
}

// ── Task Handler ───────────────────────────────────────────────────

/** Handlers throw on failure; the runtime turns a throw into a failed result. */
export type TaskHandler = (
  input: TaskInputBundle,
  store: TaskStore,
  ctx: RunContext,
) => Promise<TaskOutputBundle>;

// ── Task Definition (Registry) ─────────────────────────────────────

export interface TaskDefinition {
  taskType: PipelineTaskType;
  handler: TaskHandler;
  dependsOn: PipelineTaskType[];
}

// ── Runtime Result ─────────────────────────────────────────────────

export interface PipelineRunResult {
  correlationId: string;
  taskResults: Map<PipelineTaskType, TaskResult>;
  store: TaskStore;
  totalDurationMs: number;
  /** True when every task in the execution order succeeded */
  success: boolean;
}
