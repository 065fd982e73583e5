import type { EntityRegistry } from "../core/registry";
import { isAbsentAt } from "../core/resource";
import type { SimulationState } from "../core/state";
import type { TaskRuntime } from "../core/task";
import type { SimulationConfig } from "../schemas/config.schema";
import { isBusinessTime } from "./calendar";
import { sampleSkill, sampleStepOutput } from "./duration";
import type { WorkflowGraph } from "./graph";
import type { LogEventKind } from "./log";
import { recordStepMetrics } from "./metrics";
import type { AllocationPolicy } from "./policy";
import type { RNG } from "./random";
import { allocate, type Assignment } from "./scheduler";

export type TickContext = {
  registry: EntityRegistry;
  graph: WorkflowGraph;
  policy: AllocationPolicy;
  config: SimulationConfig;
  rng: RNG;
};

// one entry per (task, resource) pair; a task holding no resources gets a
// single entry with a null resource
function logPairs(
  state: SimulationState,
  kind: LogEventKind,
  taskId: string,
  resourceIds: readonly string[],
  amounts?: readonly number[]
): void {
  if (resourceIds.length === 0) {
    state.log.append({
      time: state.time,
      kind,
      taskId,
      resourceId: null,
      ...(amounts ? { amount: amounts[0] ?? 0 } : {}),
    });
    return;
  }
  resourceIds.forEach((resourceId, i) => {
    state.log.append({
      time: state.time,
      kind,
      taskId,
      resourceId,
      ...(amounts ? { amount: amounts[i] } : {}),
    });
  });
}

function release(state: SimulationState, task: TaskRuntime): void {
  for (const resourceId of task.assigned) {
    const resource = state.resources.get(resourceId);
    if (!resource) continue;
    resource.assigned = resource.assigned.filter((id) => id !== task.id);
    if (resource.state === "working" && resource.assigned.length === 0) {
      resource.state = "idle";
    }
  }
  task.assigned = [];
}

// remaining work below this counts as done
const WORK_EPSILON = 1e-9;

/* =========================================================
   1. CALENDAR
   ========================================================= */

function applyCalendar(state: SimulationState, stepSize: number): void {
  const now = state.time;

  for (const resource of state.resources.values()) {
    const absent = isAbsentAt(resource, now, stepSize);

    if (absent && resource.state !== "absent") {
      // pre-empt: every task the resource holds pauses and lets go of
      // all its resources, not only this one
      for (const taskId of [...resource.assigned]) {
        const task = state.tasks.get(taskId);
        if (!task || task.state !== "working") continue;
        logPairs(state, "paused", task.id, task.assigned);
        release(state, task);
        task.state = "paused";
      }
      resource.state = "absent";
      resource.assigned = [];
      state.log.append({ time: now, kind: "absent", taskId: null, resourceId: resource.id });
    } else if (!absent && resource.state === "absent") {
      resource.state = "idle";
      state.log.append({ time: now, kind: "available", taskId: null, resourceId: resource.id });
    }
  }
}

/* =========================================================
   3. ASSIGNMENT
   ========================================================= */

function applyAssignments(state: SimulationState, assignments: Assignment[]): void {
  for (const assignment of assignments) {
    const task = state.tasks.get(assignment.taskId);
    if (!task) continue;

    const kind: LogEventKind = assignment.resumed ? "resumed" : "started";
    task.state = "working";
    task.assigned = [...assignment.resourceIds];
    if (task.startedAt === undefined) task.startedAt = state.time;

    for (const resourceId of assignment.resourceIds) {
      const resource = state.resources.get(resourceId);
      if (!resource) continue;
      resource.assigned.push(task.id);
      resource.state = "working";
    }

    logPairs(state, kind, task.id, task.assigned);
  }
}

/* =========================================================
   4. PROGRESS
   ========================================================= */

function finish(state: SimulationState, task: TaskRuntime, registry: EntityRegistry): void {
  task.state = "finished";
  task.finishedAt = state.time;
  logPairs(state, "finished", task.id, task.assigned);
  release(state, task);

  for (const componentId of registry.componentsProducedBy(task.id)) {
    const component = state.components.get(componentId);
    if (!component || component.ready) continue;
    const producers = registry.component(componentId).producedBy;
    if (producers.every((id) => state.tasks.get(id)?.state === "finished")) {
      component.ready = true;
      state.log.append({
        time: state.time,
        kind: "component_ready",
        taskId: task.id,
        resourceId: null,
        componentId,
      });
    }
  }
}

type StepWork = {
  task: TaskRuntime;
  // one share per assigned resource, or a single share for an unstaffed task
  shares: number[];
};

// Every draw of the step happens here, before any task changes, so a
// rejected draw leaves the step's progress unapplied.
function planWork(state: SimulationState, ctx: TickContext): StepWork[] {
  const plans: StepWork[] = [];
  for (const task of state.tasks.values()) {
    if (task.state !== "working") continue;

    const base = sampleStepOutput(task.id, task.definition.dailyOutput, ctx.rng, ctx.config);
    if (task.assigned.length === 0) {
      plans.push({ task, shares: [base] });
      continue;
    }

    const shares = task.assigned.map((resourceId, i) => {
      const resource = state.resources.get(resourceId);
      if (!resource) return 0;
      const capability = task.definition.requirements[i]?.capability;
      const skill = capability === undefined ? undefined : resource.definition.skills[capability];
      const rate = sampleSkill(task.id, resourceId, skill, ctx.rng, ctx.config);
      // a resource holding several tasks splits its output between them
      return (base * rate) / Math.max(1, resource.assigned.length);
    });
    plans.push({ task, shares });
  }
  return plans;
}

function progress(state: SimulationState, ctx: TickContext): void {
  for (const { task, shares } of planWork(state, ctx)) {
    const amounts = shares.map((share) => {
      const amount = Math.min(share, task.remainingWork);
      task.remainingWork -= amount;
      return amount;
    });
    if (task.remainingWork < WORK_EPSILON) task.remainingWork = 0;

    logPairs(state, "work", task.id, task.assigned, amounts);

    if (task.remainingWork === 0) {
      finish(state, task, ctx.registry);
    }
  }
}

/**
 * One step: calendar -> readiness -> allocation -> progress, then the
 * caller advances time. Readiness only sees finishes from earlier steps,
 * so a successor never starts in the step its predecessor finishes.
 */
export function tick(state: SimulationState, ctx: TickContext): SimulationState {
  const { config } = ctx;
  state.time += config.stepSize;
  state.steps += 1;

  applyCalendar(state, config.stepSize);

  if (!isBusinessTime(config.calendar, state.time, config.stepSize)) {
    recordStepMetrics(state, config.stepSize, true);
    return state;
  }

  const allocatable = ctx.graph.readyTasks(state, ctx.policy.taskOrder);

  const assignments = allocate({
    tasks: allocatable,
    resources: state.resources.values(),
    registry: ctx.registry,
    policy: ctx.policy,
  });
  applyAssignments(state, assignments);

  recordStepMetrics(state, config.stepSize);

  progress(state, ctx);

  return state;
}
