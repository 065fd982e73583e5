import { z } from "zod";
import { simulationConfigSchema } from "./config.schema";

const id = z.string().min(1);

// Parameters are only type-checked here; their semantic validation
// (sd >= 0, min <= max, ...) raises InvalidDistributionParameters.
export const distributionSchema = z.discriminatedUnion("distribution", [
  z.object({
    distribution: z.literal("uniform"),
    min: z.number(),
    max: z.number(),
  }),
  z.object({
    distribution: z.literal("normal"),
    mean: z.number(),
    sd: z.number(),
  }),
  z.object({
    distribution: z.literal("triangular"),
    min: z.number(),
    mode: z.number(),
    max: z.number(),
  }),
  z.object({
    distribution: z.literal("lognormal"),
    p50: z.number(),
    p90: z.number(),
  }),
]);

export const durationSpecSchema = z.union([z.number().int(), distributionSchema]);

// output multiplier of a resource on one capability
export const skillSpecSchema = z.union([z.number().nonnegative(), distributionSchema]);

export const requirementSchema = z.union([
  id.transform((capability) => ({ capability, team: undefined })),
  z.object({
    capability: id,
    team: id.optional(),
  }),
]);

export const taskSchema = z
  .object({
    id,
    name: z.string().optional(),
    duration: durationSpecSchema,
    predecessors: z.array(id).default([]),
    // component ids consumed; merged with each component's requiredBy
    components: z.array(id).default([]),
    requirements: z.array(requirementSchema).default([]),
    dailyOutput: durationSpecSchema.optional(),
    initialProgress: z.number().min(0).max(1).default(0),
    dueDate: z.number().int().optional(),
  })
  .transform((t) => ({ ...t, name: t.name ?? t.id }));

export const workflowSchema = z
  .object({
    id,
    name: z.string().optional(),
    tasks: z.array(taskSchema),
  })
  .transform((w) => ({ ...w, name: w.name ?? w.id }));

export const absenceSchema = z
  .object({
    from: z.number().int(),
    to: z.number().int(),
  })
  .refine((a) => a.from <= a.to, { message: "absence 'from' must not be after 'to'" });

export const resourceSchema = z
  .object({
    id,
    name: z.string().optional(),
    capabilities: z.array(id).default([]),
    capacity: z.number().int().nonnegative().default(1),
    absences: z.array(absenceSchema).default([]),
    costPerTime: z.number().nonnegative().default(0),
    skills: z.record(id, skillSpecSchema).default({}),
  })
  .transform((r) => ({ ...r, name: r.name ?? r.id }));

export const teamSchema = z
  .object({
    id,
    name: z.string().optional(),
    members: z.array(id).default([]),
  })
  .transform((t) => ({ ...t, name: t.name ?? t.id }));

export const componentSchema = z
  .object({
    id,
    name: z.string().optional(),
    producedBy: z.array(id).default([]),
    requiredBy: z.array(id).default([]),
  })
  .transform((c) => ({ ...c, name: c.name ?? c.id }));

export const projectSchema = z.object({
  name: z.string().default("project"),
  workflows: z.array(workflowSchema).min(1),
  resources: z.array(resourceSchema).default([]),
  teams: z.array(teamSchema).default([]),
  components: z.array(componentSchema).default([]),
  config: simulationConfigSchema.default({}),
});

export type DistributionSpec = z.infer<typeof distributionSchema>;
export type DurationSpec = z.infer<typeof durationSpecSchema>;
export type SkillSpec = z.infer<typeof skillSpecSchema>;
export type Requirement = z.infer<typeof requirementSchema>;
export type TaskDefinition = z.infer<typeof taskSchema>;
export type WorkflowDefinition = z.infer<typeof workflowSchema>;
export type Absence = z.infer<typeof absenceSchema>;
export type ResourceDefinition = z.infer<typeof resourceSchema>;
export type TeamDefinition = z.infer<typeof teamSchema>;
export type ComponentDefinition = z.infer<typeof componentSchema>;
export type ProjectDefinition = z.infer<typeof projectSchema>;
export type ProjectInput = z.input<typeof projectSchema>;
