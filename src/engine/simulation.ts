import type { ComponentRuntime } from "../core/component";
import type { ResourceUtilization, TrialCost } from "../core/metrics";
import type { Project } from "../core/project";
import type { ResourceRuntime } from "../core/resource";
import type { SimulationState } from "../core/state";
import type { TaskRuntime, TaskState } from "../core/task";
import { HorizonExceededError, InvalidDistributionParameters } from "../lib/errors";
import { getDefaultLogger, type Logger } from "../lib/logger";
import {
  computeCriticalPath,
  spansFromState,
  type CriticalPathReport,
} from "./critical-path";
import { sampleDuration } from "./duration";
import { ExecutionLog } from "./log";
import { computeCost, computeUtilization } from "./metrics";
import { resolvePolicy, type AllocationPolicy } from "./policy";
import { createRNG, type RNG } from "./random";
import { tick, type TickContext } from "./tick";

export type TrialStatus = "completed" | "horizon_exceeded" | "cancelled" | "invalid_duration";

export type TrialError = HorizonExceededError | InvalidDistributionParameters;

export type TaskOutcome = {
  taskId: string;
  state: TaskState;
  requiredWork: number;
  remainingWork: number;
  readyAt?: number;
  startedAt?: number;
  finishedAt?: number;
};

export type TrialResult = {
  trial: number;
  seed: number;
  status: TrialStatus;
  // time of the last executed step
  duration: number;
  steps: number;
  tasks: TaskOutcome[];
  criticalPath: CriticalPathReport;
  utilization: ResourceUtilization[];
  cost: TrialCost;
  log: ExecutionLog;
  error?: TrialError;
};

export type SimulateOptions = {
  trial?: number;
  seed?: number;
  signal?: AbortSignal;
  logger?: Logger;
  policy?: Partial<AllocationPolicy>;
};

// durations are drawn here, in topological order, before the first step
export function createInitialState(project: Project, rng: RNG): SimulationState {
  const { registry, graph, config } = project;

  const tasks = new Map<string, TaskRuntime>();
  for (const id of graph.topologicalOrder()) {
    const definition = registry.task(id);
    const sampled = sampleDuration(id, definition.duration, rng, config.negativeDurations);
    const requiredWork = Math.ceil(sampled * (1 - definition.initialProgress));
    const done = definition.initialProgress >= 1;

    tasks.set(id, {
      id,
      definition,
      state: done ? "finished" : "not_ready",
      requiredWork,
      remainingWork: done ? 0 : requiredWork,
      ...(done ? { finishedAt: 0 } : {}),
      assigned: [],
    });
  }

  const resources = new Map<string, ResourceRuntime>();
  const loadSeries = new Map<string, number[]>();
  for (const definition of registry.allResources()) {
    resources.set(definition.id, {
      id: definition.id,
      definition,
      state: "idle",
      assigned: [],
    });
    loadSeries.set(definition.id, []);
  }

  const components = new Map<string, ComponentRuntime>();
  for (const definition of registry.allComponents()) {
    components.set(definition.id, {
      id: definition.id,
      ready: definition.producedBy.every((id) => tasks.get(id)?.state === "finished"),
    });
  }

  return {
    time: 0,
    steps: 0,
    tasks,
    resources,
    components,
    log: new ExecutionLog(),
    costSeries: [],
    loadSeries,
  };
}

function outcomes(state: SimulationState): TaskOutcome[] {
  return [...state.tasks.values()].map((task) => ({
    taskId: task.id,
    state: task.state,
    requiredWork: task.requiredWork,
    remainingWork: task.remainingWork,
    ...(task.readyAt !== undefined ? { readyAt: task.readyAt } : {}),
    ...(task.startedAt !== undefined ? { startedAt: task.startedAt } : {}),
    ...(task.finishedAt !== undefined ? { finishedAt: task.finishedAt } : {}),
  }));
}

function criticalPathOf(project: Project, state: SimulationState): CriticalPathReport {
  const { graph, config } = project;
  if (config.criticalPathMode === "what-if") {
    const work = new Map([...state.tasks.values()].map((t) => [t.id, t.requiredWork]));
    return computeCriticalPath(graph, graph.plannedSpans(work), config.stepSize, "what-if");
  }
  return computeCriticalPath(graph, spansFromState(state), config.stepSize, "actual");
}

function rejectedTrial(
  project: Project,
  trial: number,
  seed: number,
  error: InvalidDistributionParameters
): TrialResult {
  return {
    trial,
    seed,
    status: "invalid_duration",
    duration: 0,
    steps: 0,
    tasks: [],
    criticalPath: computeCriticalPath(
      project.graph,
      new Map(),
      project.config.stepSize,
      project.config.criticalPathMode
    ),
    utilization: [],
    cost: { total: 0, series: [] },
    log: new ExecutionLog(),
    error,
  };
}

/**
 * Runs one trial to completion, to the horizon, or until `signal` aborts.
 * Cancellation is only observed between steps. A horizon overrun or a
 * rejected duration draw is returned on the result, not thrown; the log
 * then holds every step before the failing one.
 */
export function simulate(project: Project, options: SimulateOptions = {}): TrialResult {
  const { config } = project;
  const trial = options.trial ?? 0;
  const seed = options.seed ?? config.randomSeed;
  const logger = (options.logger ?? getDefaultLogger()).child({ trial, seed });

  const rng = createRNG(seed);
  let state: SimulationState;
  try {
    state = createInitialState(project, rng);
  } catch (err) {
    if (!(err instanceof InvalidDistributionParameters)) throw err;
    logger.warn({ err, taskId: err.taskId }, "trial rejected a sampled duration");
    return rejectedTrial(project, trial, seed, err);
  }

  const ctx: TickContext = {
    registry: project.registry,
    graph: project.graph,
    policy: resolvePolicy(config.allocationPolicy, options.policy),
    config,
    rng,
  };

  logger.debug({ policy: ctx.policy.name, tasks: state.tasks.size }, "trial started");

  let status: TrialStatus = "completed";
  let error: TrialError | undefined;
  try {
    while (!project.graph.isComplete(state)) {
      if (options.signal?.aborted) {
        status = "cancelled";
        break;
      }
      if (state.time + config.stepSize > config.horizon) {
        status = "horizon_exceeded";
        break;
      }
      tick(state, ctx);
    }
  } catch (err) {
    if (!(err instanceof InvalidDistributionParameters)) throw err;
    status = "invalid_duration";
    error = err;
    logger.warn({ err, taskId: err.taskId, time: state.time }, "trial rejected a sampled output");
  }

  if (status === "horizon_exceeded") {
    const unfinished = [...state.tasks.values()]
      .filter((t) => t.state !== "finished")
      .map((t) => t.id);
    error = new HorizonExceededError(trial, config.horizon, unfinished);
    logger.warn({ err: error, unfinished }, "trial exceeded horizon");
  } else if (status === "cancelled") {
    logger.info({ time: state.time }, "trial cancelled");
  }

  logger.debug({ status, duration: state.time, logEntries: state.log.size }, "trial finished");

  return {
    trial,
    seed,
    status,
    duration: state.time,
    steps: state.steps,
    tasks: outcomes(state),
    criticalPath: criticalPathOf(project, state),
    utilization: computeUtilization(state),
    cost: computeCost(state),
    log: state.log,
    ...(error ? { error } : {}),
  };
}
