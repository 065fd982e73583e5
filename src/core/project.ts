import { ValidationError } from "../lib/errors";
import { distributionProblem, validateDurationSpec } from "../engine/duration";
import { WorkflowGraph } from "../engine/graph";
import type { SimulationConfig, SimulationConfigInput } from "../schemas/config.schema";
import {
  projectSchema,
  type ProjectDefinition,
  type ProjectInput,
} from "../schemas/project.schema";
import { EntityRegistry } from "./registry";

/**
 * A validated, immutable project. Owns every entity through its registry;
 * trials instantiate their own runtime state from it and never mutate it.
 */
export type Project = {
  name: string;
  definition: ProjectDefinition;
  config: SimulationConfig;
  registry: EntityRegistry;
  graph: WorkflowGraph;
};

/**
 * Validates the input and builds the registry and precedence graph.
 *
 * Throws ValidationError for malformed input or unknown references,
 * CyclicWorkflowError for a precedence cycle and
 * InvalidDistributionParameters for an unusable duration. An unusable
 * resource skill is a ValidationError.
 */
export function buildProject(input: ProjectInput): Project {
  const parsed = projectSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, "project");
  }
  const definition = parsed.data;

  const registry = new EntityRegistry(definition);

  for (const task of registry.allTasks()) {
    validateDurationSpec(task.id, task.duration);
    if (task.dailyOutput !== undefined) {
      validateDurationSpec(task.id, task.dailyOutput);
    }
  }

  for (const resource of registry.allResources()) {
    for (const [capability, skill] of Object.entries(resource.skills)) {
      if (typeof skill === "number") continue;
      const problem = distributionProblem(skill);
      if (problem !== null) {
        throw new ValidationError(
          `Resource '${resource.id}' has an invalid output skill for '${capability}': ${problem}`,
          { resourceId: resource.id, capability }
        );
      }
    }
  }

  const graph = new WorkflowGraph(registry, definition.config.stepSize);

  return {
    name: definition.name,
    definition,
    config: definition.config,
    registry,
    graph,
  };
}

export function withConfig(project: Project, overrides: SimulationConfigInput): Project {
  return buildProject({
    ...project.definition,
    config: {
      ...project.definition.config,
      ...overrides,
      allocationPolicy: {
        ...project.definition.config.allocationPolicy,
        ...overrides.allocationPolicy,
      },
    },
  });
}
