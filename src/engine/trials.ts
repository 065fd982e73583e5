import type { Project } from "../core/project";
import { getDefaultLogger, type Logger } from "../lib/logger";
import { auditProject, type UnreachableTask } from "./audit";
import type { AllocationPolicy } from "./policy";
import { deriveSeed } from "./random";
import { simulate, type TrialResult } from "./simulation";

export type PercentileResult = {
  level: number;
  value: number;
};

export type DurationStats = {
  min: number;
  mean: number;
  max: number;
  percentiles: PercentileResult[];
};

export type TrialSummary = {
  trials: number;
  completed: number;
  // indices of trials that did not complete
  incomplete: number[];
  // over completed trials only; null when none completed
  duration: DurationStats | null;
  // share of trials in which each task was on the critical path
  criticality: Record<string, number>;
  // mean utilization per resource across trials
  utilization: Record<string, number>;
  meanCost: number;
};

export type TrialResults = {
  project: string;
  seed: number;
  warnings: UnreachableTask[];
  trials: TrialResult[];
  summary: TrialSummary;
};

export type RunOptions = {
  trials?: number;
  signal?: AbortSignal;
  logger?: Logger;
  policy?: Partial<AllocationPolicy>;
};

export const DEFAULT_CONFIDENCE_LEVELS = [50, 85, 95];

// linear interpolation over an ascending array
export function computePercentiles(sorted: readonly number[], levels: number[]): PercentileResult[] {
  const count = sorted.length;
  if (count === 0) {
    return levels.map((level) => ({ level, value: 0 }));
  }

  return levels.map((level) => {
    if (level <= 0) return { level, value: sorted[0] };
    if (level >= 100) return { level, value: sorted[count - 1] };

    const rank = (level / 100) * (count - 1);
    const lower = Math.floor(rank);
    const upper = Math.ceil(rank);
    const fraction = rank - lower;
    return { level, value: sorted[lower] + fraction * (sorted[upper] - sorted[lower]) };
  });
}

export function summarize(
  project: Pick<Project, "graph" | "registry">,
  trials: readonly TrialResult[]
): TrialSummary {
  const completed = trials.filter((t) => t.status === "completed");
  const durations = completed.map((t) => t.duration).sort((a, b) => a - b);

  const criticality: Record<string, number> = {};
  for (const taskId of project.graph.topologicalOrder()) {
    const hits = trials.filter((t) => t.criticalPath.criticalPath.includes(taskId)).length;
    criticality[taskId] = trials.length > 0 ? hits / trials.length : 0;
  }

  const utilization: Record<string, number> = {};
  for (const resource of project.registry.allResources()) {
    const values = trials.map(
      (t) => t.utilization.find((u) => u.resourceId === resource.id)?.utilization ?? 0
    );
    utilization[resource.id] =
      values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
  }

  return {
    trials: trials.length,
    completed: completed.length,
    incomplete: trials.filter((t) => t.status !== "completed").map((t) => t.trial),
    duration:
      durations.length === 0
        ? null
        : {
            min: durations[0],
            mean: durations.reduce((sum, d) => sum + d, 0) / durations.length,
            max: durations[durations.length - 1],
            percentiles: computePercentiles(durations, DEFAULT_CONFIDENCE_LEVELS),
          },
    criticality,
    utilization,
    meanCost:
      trials.length > 0 ? trials.reduce((sum, t) => sum + t.cost.total, 0) / trials.length : 0,
  };
}

/**
 * Monte-Carlo run: `trials` independent simulations, trial i seeded with
 * deriveSeed(randomSeed, i). A trial that overruns the horizon is marked
 * incomplete and the batch carries on.
 */
export function run(project: Project, options: RunOptions = {}): TrialResults {
  const count = options.trials ?? 1;
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Trial count must be a positive integer, got ${count}`);
  }
  const logger = options.logger ?? getDefaultLogger();
  const seed = project.config.randomSeed;

  const warnings = auditProject(project);
  for (const warning of warnings) {
    logger.warn({ taskId: warning.taskId, reason: warning.reason }, warning.message);
  }

  const trials: TrialResult[] = [];
  for (let i = 0; i < count; i++) {
    if (options.signal?.aborted) break;
    trials.push(
      simulate(project, {
        trial: i,
        seed: deriveSeed(seed, i),
        logger,
        ...(options.signal ? { signal: options.signal } : {}),
        ...(options.policy ? { policy: options.policy } : {}),
      })
    );
  }

  const summary = summarize(project, trials);
  logger.info(
    { project: project.name, trials: summary.trials, completed: summary.completed },
    "run finished"
  );

  return { project: project.name, seed, warnings, trials, summary };
}
