import { InvalidDistributionParameters } from "../lib/errors";
import type {
  DistributionSpec,
  DurationSpec,
  SkillSpec,
} from "../schemas/project.schema";
import type { SimulationConfig } from "../schemas/config.schema";
import { type RNG, standardNormal } from "./random";

// z-score of the 90th percentile of a standard normal
const Z_90 = 1.2816;

export type NegativeDurationHandling = SimulationConfig["negativeDurations"];

type OutputConfig = Pick<SimulationConfig, "durationMode" | "negativeDurations" | "stepSize">;

export function distributionProblem(spec: DistributionSpec): string | null {
  const values = Object.entries(spec).filter(([key]) => key !== "distribution");
  for (const [key, value] of values) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return `${key} must be finite`;
    }
  }

  switch (spec.distribution) {
    case "uniform":
      return spec.min > spec.max ? "uniform min > max" : null;
    case "normal":
      return spec.sd < 0 ? "normal sd < 0" : null;
    case "triangular":
      return spec.min > spec.mode || spec.mode > spec.max
        ? "triangular requires min <= mode <= max"
        : null;
    case "lognormal":
      if (spec.p50 <= 0) return "lognormal p50 must be positive";
      return spec.p90 < spec.p50 ? "lognormal p90 < p50" : null;
  }
}

// Runs before the first step so a bad configuration never surfaces mid-simulation.
export function validateDurationSpec(taskId: string, spec: DurationSpec): void {
  if (typeof spec === "number") {
    if (!Number.isInteger(spec) || spec < 0) {
      throw new InvalidDistributionParameters(
        taskId,
        `fixed duration must be a non-negative integer, got ${spec}`,
        { spec }
      );
    }
    return;
  }

  const problem = distributionProblem(spec);
  if (problem !== null) {
    throw new InvalidDistributionParameters(taskId, problem, { spec });
  }
}

export function sampleDistribution(spec: DistributionSpec, rng: RNG): number {
  switch (spec.distribution) {
    case "uniform":
      return spec.min + rng() * (spec.max - spec.min);

    case "normal":
      return spec.mean + spec.sd * standardNormal(rng);

    case "triangular": {
      const range = spec.max - spec.min;
      if (range === 0) return spec.min;
      const u = rng();
      const c = (spec.mode - spec.min) / range;
      return u < c
        ? spec.min + Math.sqrt(u * range * (spec.mode - spec.min))
        : spec.max - Math.sqrt((1 - u) * range * (spec.max - spec.mode));
    }

    case "lognormal": {
      const mu = Math.log(spec.p50);
      // p50 === p90 gives sigma 0, i.e. a deterministic draw
      const sigma = (Math.log(spec.p90) - mu) / Z_90;
      return Math.exp(mu + sigma * standardNormal(rng));
    }
  }
}

// lognormal uses its median
export function expectedValue(spec: DistributionSpec): number {
  switch (spec.distribution) {
    case "uniform":
      return (spec.min + spec.max) / 2;
    case "normal":
      return spec.mean;
    case "triangular":
      return (spec.min + spec.mode + spec.max) / 3;
    case "lognormal":
      return spec.p50;
  }
}

function toWorkAmount(
  taskId: string,
  value: number,
  handling: NegativeDurationHandling
): number {
  const amount = Math.round(value);
  if (amount < 0 && handling === "reject") {
    throw new InvalidDistributionParameters(taskId, `sampled negative work amount ${amount}`, {
      sampled: amount,
    });
  }
  return Math.max(0, amount);
}

// fixed specs return their value without drawing
export function sampleDuration(
  taskId: string,
  spec: DurationSpec,
  rng: RNG,
  handling: NegativeDurationHandling
): number {
  if (typeof spec === "number") return spec;
  return toWorkAmount(taskId, sampleDistribution(spec, rng), handling);
}

/**
 * Base work a task can take in one step: one unit per time unit in "fixed"
 * mode, a fresh `dailyOutput` draw per time unit in "variable-daily-output".
 */
export function sampleStepOutput(
  taskId: string,
  dailyOutput: DurationSpec | undefined,
  rng: RNG,
  config: OutputConfig
): number {
  if (config.durationMode === "fixed" || dailyOutput === undefined) {
    return config.stepSize;
  }
  return sampleDuration(taskId, dailyOutput, rng, config.negativeDurations) * config.stepSize;
}

/**
 * Output multiplier of one resource on one requirement. Unset skills are 1;
 * distribution skills are drawn per step in "variable-daily-output" mode and
 * fixed at their expected value otherwise.
 */
export function sampleSkill(
  taskId: string,
  resourceId: string,
  skill: SkillSpec | undefined,
  rng: RNG,
  config: OutputConfig
): number {
  if (skill === undefined) return 1;
  if (typeof skill === "number") return skill;
  if (config.durationMode === "fixed") return Math.max(0, expectedValue(skill));

  const value = sampleDistribution(skill, rng);
  if (value < 0 && config.negativeDurations === "reject") {
    throw new InvalidDistributionParameters(
      taskId,
      `resource '${resourceId}' sampled negative output ${value}`,
      { resourceId, sampled: value }
    );
  }
  return Math.max(0, value);
}

export function plannedDuration(spec: DurationSpec): number {
  if (typeof spec === "number") return spec;
  return Math.max(0, Math.round(expectedValue(spec)));
}
