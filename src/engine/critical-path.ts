import type { SimulationState } from "../core/state";
import type { CriticalPathMode } from "../schemas/config.schema";
import type { ExecutionLog } from "./log";
import type { WorkflowGraph } from "./graph";

// first and last step a task occupied, both inclusive
export type TaskSpan = {
  start: number;
  finish: number;
};

export type TaskTiming = {
  taskId: string;
  earliestStart: number;
  earliestFinish: number;
  latestStart: number;
  latestFinish: number;
  float: number;
  critical: boolean;
};

export type CriticalPathReport = {
  mode: CriticalPathMode;
  projectFinish: number;
  tasks: TaskTiming[];
  // zero-float tasks in topological order; parallel critical chains all appear
  criticalPath: string[];
};

type GraphView = Pick<WorkflowGraph, "topologicalOrder" | "successorsOf">;

/**
 * Forward/backward pass over the given spans.
 *
 * Internally a task occupies the half-open interval (start - stepSize, finish],
 * so a successor may start at the earliest one step after its predecessor's
 * finish. Tasks without a span (never finished) are left out, and edges to
 * them are ignored.
 */
export function computeTimings(
  graph: GraphView,
  spans: Map<string, TaskSpan>,
  stepSize: number
): TaskTiming[] {
  const order = graph.topologicalOrder().filter((id) => spans.has(id));

  let projectFinish = 0;
  for (const span of spans.values()) {
    projectFinish = Math.max(projectFinish, span.finish);
  }

  // backward pass: latest (half-open) start per task
  const latest = new Map<string, number>();
  for (const id of [...order].reverse()) {
    const span = spans.get(id);
    if (!span) continue;
    const length = span.finish - (span.start - stepSize);

    let lf = projectFinish;
    for (const succId of graph.successorsOf(id)) {
      const ls = latest.get(succId);
      if (ls !== undefined) lf = Math.min(lf, ls);
    }
    latest.set(id, lf - length);
  }

  const timings: TaskTiming[] = [];
  for (const id of order) {
    const span = spans.get(id);
    const ls = latest.get(id);
    if (!span || ls === undefined) continue;

    const es = span.start - stepSize;
    const length = span.finish - es;
    const float = ls - es;
    timings.push({
      taskId: id,
      earliestStart: span.start,
      earliestFinish: span.finish,
      latestStart: ls + stepSize,
      latestFinish: ls + length,
      float,
      critical: float === 0,
    });
  }
  return timings;
}

export function computeCriticalPath(
  graph: GraphView,
  spans: Map<string, TaskSpan>,
  stepSize: number,
  mode: CriticalPathMode
): CriticalPathReport {
  const tasks = computeTimings(graph, spans, stepSize);
  return {
    mode,
    projectFinish: tasks.reduce((max, t) => Math.max(max, t.latestFinish), 0),
    tasks,
    criticalPath: tasks.filter((t) => t.critical).map((t) => t.taskId),
  };
}

export function spansFromState(state: SimulationState): Map<string, TaskSpan> {
  const spans = new Map<string, TaskSpan>();
  for (const task of state.tasks.values()) {
    if (task.startedAt !== undefined && task.finishedAt !== undefined) {
      spans.set(task.id, { start: task.startedAt, finish: task.finishedAt });
    }
  }
  return spans;
}

export function spansFromLog(log: ExecutionLog): Map<string, TaskSpan> {
  const starts = new Map<string, number>();
  const finishes = new Map<string, number>();
  for (const entry of log.all()) {
    if (entry.taskId === null) continue;
    if (entry.kind === "started" && !starts.has(entry.taskId)) {
      starts.set(entry.taskId, entry.time);
    }
    if (entry.kind === "finished") {
      finishes.set(entry.taskId, entry.time);
    }
  }

  const spans = new Map<string, TaskSpan>();
  for (const [taskId, start] of starts) {
    const finish = finishes.get(taskId);
    if (finish !== undefined) spans.set(taskId, { start, finish });
  }
  return spans;
}

export function criticalPathFromLog(
  graph: GraphView,
  log: ExecutionLog,
  stepSize: number
): CriticalPathReport {
  return computeCriticalPath(graph, spansFromLog(log), stepSize, "actual");
}
