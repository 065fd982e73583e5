import type { ResourceDefinition } from "../schemas/project.schema";

export type ResourceState = "idle" | "working" | "absent";

export type ResourceRuntime = {
  id: string;
  definition: ResourceDefinition;
  state: ResourceState;

  // task ids currently held, at most definition.capacity
  assigned: string[];
};

// whether any absence overlaps the step (time - stepSize, time]
export function isAbsentAt(resource: ResourceRuntime, time: number, stepSize = 1): boolean {
  return resource.definition.absences.some((a) => a.from <= time && a.to > time - stepSize);
}
