import { z } from "zod";

export const TASK_ORDER_NAMES = [
  "topological",
  "shortest-task-first",
  "most-successors-first",
  "least-slack-first",
] as const;

export const RESOURCE_SELECTION_NAMES = [
  "least-loaded",
  "fewest-capabilities-first",
] as const;

export const calendarSchema = z
  .object({
    origin: z.string().datetime({ offset: true }),
    unitMinutes: z.number().int().positive().default(60),
    weekendWorking: z.boolean().default(true),
    workStartHour: z.number().int().min(0).max(23).optional(),
    workFinishHour: z.number().int().min(0).max(23).optional(),
  })
  .refine(
    (c) =>
      c.workStartHour === undefined ||
      c.workFinishHour === undefined ||
      c.workStartHour <= c.workFinishHour,
    { message: "workStartHour must not be after workFinishHour" }
  );

export const allocationPolicySchema = z.object({
  taskOrder: z.enum(TASK_ORDER_NAMES).default("topological"),
  resourceSelection: z.enum(RESOURCE_SELECTION_NAMES).default("least-loaded"),
});

export const simulationConfigSchema = z.object({
  horizon: z.number().int().positive().default(10000),
  stepSize: z.number().int().positive().default(1),
  allocationPolicy: allocationPolicySchema.default({}),
  randomSeed: z.number().int().default(1),
  // "variable-daily-output" re-samples task output every step; runs stay
  // reproducible per seed but a task's total duration is no longer fixed
  // at instantiation.
  durationMode: z.enum(["fixed", "variable-daily-output"]).default("fixed"),
  negativeDurations: z.enum(["clamp", "reject"]).default("clamp"),
  criticalPathMode: z.enum(["actual", "what-if"]).default("actual"),
  calendar: calendarSchema.optional(),
});

export type TaskOrderName = (typeof TASK_ORDER_NAMES)[number];
export type ResourceSelectionName = (typeof RESOURCE_SELECTION_NAMES)[number];
export type BusinessCalendar = z.infer<typeof calendarSchema>;
export type AllocationPolicyConfig = z.infer<typeof allocationPolicySchema>;
export type SimulationConfig = z.infer<typeof simulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;
export type DurationMode = SimulationConfig["durationMode"];
export type CriticalPathMode = SimulationConfig["criticalPathMode"];
