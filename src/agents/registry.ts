/**
 * Task Registry: the source tasks and CONSOLIDATE, with their dependency
 * DAG and topological execution order.
 *
 * Sources have no dependencies on each other; they run in the listed order
 * so log output reads call → edetail → events → reach.
 */

import type { TaskDefinition, PipelineTaskType } from "./types.js";
import {
  handleCall,
  handleEdetail,
  handleEvents,
  handleReach,
  handleConsolidate,
} from "./tasks/index.js";

export const TASK_DEFINITIONS: TaskDefinition[] = [
  { taskType: "CALL", handler: handleCall, dependsOn: [] },
  { taskType: "EDETAIL", handler: handleEdetail, dependsOn: [] },
  { taskType: "EVENTS", handler: handleEvents, dependsOn: [] },
  { taskType: "REACH", handler: handleReach, dependsOn: [] },
  {
    taskType: "CONSOLIDATE",
    handler: handleConsolidate,
    dependsOn: ["CALL", "EDETAIL", "EVENTS", "REACH"],
  },
];

/**
 * Get the topological execution order for a set of tasks.
 * Returns tasks sorted so that dependencies come before dependents.
 */
export function getExecutionOrder(definitions: TaskDefinition[] = TASK_DEFINITIONS): PipelineTaskType[] {
  const defMap = new Map(definitions.map((d) => [d.taskType, d]));
  const visited = new Set<PipelineTaskType>();
  const order: PipelineTaskType[] = [];

  function visit(taskType: PipelineTaskType): void {
    if (visited.has(taskType)) return;
    visited.add(taskType);
    const def = defMap.get(taskType);
    if (!def) throw new Error(`Unknown task type: ${taskType}`);
    for (const dep of def.dependsOn) {
      visit(dep);
    }
    order.push(taskType);
  }

  for (const def of definitions) {
    visit(def.taskType);
  }

  return order;
}

/**
 * Lookup a task definition by type.
 */
export function getTaskDefinition(
  taskType: PipelineTaskType,
  definitions: TaskDefinition[] = TASK_DEFINITIONS,
): TaskDefinition {
  const def = definitions.find((d) => d.taskType === taskType);
  if (!def) throw new Error(`Unknown task type: ${taskType}`);
  return def;
}
