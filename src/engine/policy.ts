import { compareIds } from "../core/registry";
import type { TaskRuntime } from "../core/task";
import type {
  AllocationPolicyConfig,
  ResourceSelectionName,
  TaskOrderName,
} from "../schemas/config.schema";
import type { WorkflowGraph } from "./graph";

type GraphView = Pick<WorkflowGraph, "topoIndex" | "descendantCount" | "plannedFloat">;

export type TaskComparator = (a: TaskRuntime, b: TaskRuntime, graph: GraphView) => number;

export type ResourceCandidate = {
  id: string;
  capabilities: readonly string[];
  capacity: number;
  load: number;
};

export type ResourceComparator = (a: ResourceCandidate, b: ResourceCandidate) => number;

export type AllocationPolicy = {
  name: string;
  taskOrder: TaskComparator;
  resourceSelection: ResourceComparator;
};

const byTopology: TaskComparator = (a, b, graph) =>
  graph.topoIndex(a.id) - graph.topoIndex(b.id) || compareIds(a.id, b.id);

export const TASK_ORDERS: Record<TaskOrderName, TaskComparator> = {
  topological: byTopology,

  "shortest-task-first": (a, b, graph) =>
    a.remainingWork - b.remainingWork || byTopology(a, b, graph),

  "most-successors-first": (a, b, graph) =>
    graph.descendantCount(b.id) - graph.descendantCount(a.id) || byTopology(a, b, graph),

  // least float in the expected-duration plan first
  "least-slack-first": (a, b, graph) =>
    graph.plannedFloat(a.id) - graph.plannedFloat(b.id) || byTopology(a, b, graph),
};

const leastLoaded: ResourceComparator = (a, b) =>
  a.load - b.load || compareIds(a.id, b.id);

export const RESOURCE_SELECTIONS: Record<ResourceSelectionName, ResourceComparator> = {
  "least-loaded": leastLoaded,

  // keep versatile resources free for tasks only they can serve
  "fewest-capabilities-first": (a, b) =>
    a.capabilities.length - b.capabilities.length || leastLoaded(a, b),
};

export function resolvePolicy(
  config: AllocationPolicyConfig,
  overrides: Partial<AllocationPolicy> = {}
): AllocationPolicy {
  return {
    name: overrides.name ?? `${config.taskOrder}/${config.resourceSelection}`,
    taskOrder: overrides.taskOrder ?? TASK_ORDERS[config.taskOrder],
    resourceSelection: overrides.resourceSelection ?? RESOURCE_SELECTIONS[config.resourceSelection],
  };
}
