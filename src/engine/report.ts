import type { Project } from "../core/project";
import type { TaskState } from "../core/task";
import type { LogEntry } from "./log";
import type { TrialResult, TrialStatus } from "./simulation";

export type ScheduleRow = {
  taskId: string;
  name: string;
  workflowId: string;
  requiredWork: number;
  finished: boolean;
  readyAt: number | null;
  startedAt: number | null;
  finishedAt: number | null;
  earliestStart: number | null;
  earliestFinish: number | null;
  latestStart: number | null;
  latestFinish: number | null;
  float: number | null;
  critical: boolean;
  dueDate: number | null;
  // finish past the due date; 0 when on time, null without a due date or finish
  lateness: number | null;
};

export type ResourceRow = {
  resourceId: string;
  name: string;
  teams: string[];
  capacity: number;
  utilization: number;
  series: number[];
};

export type ScheduleReport = {
  trial: number;
  status: TrialStatus;
  duration: number;
  criticalPath: string[];
  totalCost: number;
  tasks: ScheduleRow[];
  resources: ResourceRow[];
};

export function buildScheduleReport(project: Project, result: TrialResult): ScheduleReport {
  const { registry } = project;
  const timings = new Map(result.criticalPath.tasks.map((t) => [t.taskId, t]));

  const tasks = result.tasks.map((outcome): ScheduleRow => {
    const definition = registry.task(outcome.taskId);
    const timing = timings.get(outcome.taskId);
    const dueDate = definition.dueDate ?? null;
    const finishedAt = outcome.finishedAt ?? null;

    return {
      taskId: outcome.taskId,
      name: definition.name,
      workflowId: registry.workflowOf(outcome.taskId),
      requiredWork: outcome.requiredWork,
      finished: outcome.state === "finished",
      readyAt: outcome.readyAt ?? null,
      startedAt: outcome.startedAt ?? null,
      finishedAt,
      earliestStart: timing?.earliestStart ?? null,
      earliestFinish: timing?.earliestFinish ?? null,
      latestStart: timing?.latestStart ?? null,
      latestFinish: timing?.latestFinish ?? null,
      float: timing?.float ?? null,
      critical: timing?.critical ?? false,
      dueDate,
      lateness:
        dueDate === null || finishedAt === null ? null : Math.max(0, finishedAt - dueDate),
    };
  });

  const resources = result.utilization.map(
    (u): ResourceRow => ({
      resourceId: u.resourceId,
      name: registry.resource(u.resourceId).name,
      teams: registry.teamsOf(u.resourceId),
      capacity: u.capacity,
      utilization: u.utilization,
      series: u.series,
    })
  );

  return {
    trial: result.trial,
    status: result.status,
    duration: result.duration,
    criticalPath: result.criticalPath.criticalPath,
    totalCost: result.cost.total,
    tasks,
    resources,
  };
}

const TRANSITION_BY_KIND: Partial<Record<LogEntry["kind"], TaskState>> = {
  ready: "ready",
  started: "working",
  resumed: "working",
  paused: "paused",
  finished: "finished",
};

export function taskTransitions(entries: readonly LogEntry[]): TaskState[] {
  const states: TaskState[] = ["not_ready"];
  let lastKey = "";
  for (const entry of entries) {
    const next = TRANSITION_BY_KIND[entry.kind];
    if (next === undefined) continue;
    // per-resource duplicates of the same transition collapse into one
    const key = `${entry.time}:${entry.kind}`;
    if (key === lastKey) continue;
    lastKey = key;
    states.push(next);
  }
  return states;
}
