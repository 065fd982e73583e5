import type { TaskDefinition } from "../schemas/project.schema";

export type TaskState = "not_ready" | "ready" | "working" | "paused" | "finished";

export const TASK_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  not_ready: ["ready"],
  ready: ["working"],
  working: ["paused", "finished"],
  paused: ["working"],
  finished: [],
};

export type TaskRuntime = {
  id: string;
  definition: TaskDefinition;
  state: TaskState;

  // work sampled for this trial, after initial progress
  requiredWork: number;
  remainingWork: number;

  readyAt?: number;
  startedAt?: number;
  finishedAt?: number;

  // resource ids, in requirement order
  assigned: string[];
};

export function isAllocatable(task: TaskRuntime): boolean {
  return task.state === "ready" || task.state === "paused";
}
