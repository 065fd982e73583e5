import type { EntityRegistry } from "../core/registry";
import type { ResourceRuntime } from "../core/resource";
import type { TaskRuntime } from "../core/task";
import type { Requirement } from "../schemas/project.schema";
import type { AllocationPolicy, ResourceCandidate } from "./policy";

export type Assignment = {
  taskId: string;
  // one resource per requirement, in requirement order
  resourceIds: string[];
  resumed: boolean;
};

export type AllocationInput = {
  // allocatable tasks, already in priority order
  tasks: readonly TaskRuntime[];
  resources: Iterable<ResourceRuntime>;
  registry: Pick<EntityRegistry, "isMember">;
  policy: AllocationPolicy;
};

export function toCandidates(resources: Iterable<ResourceRuntime>): ResourceCandidate[] {
  const candidates: ResourceCandidate[] = [];
  for (const r of resources) {
    if (r.state === "absent") continue;
    candidates.push({
      id: r.id,
      capabilities: r.definition.capabilities,
      capacity: r.definition.capacity,
      load: r.assigned.length,
    });
  }
  return candidates;
}

export function eligibleFor(
  requirement: Requirement,
  candidates: readonly ResourceCandidate[],
  registry: Pick<EntityRegistry, "isMember">
): ResourceCandidate[] {
  return candidates.filter(
    (c) =>
      c.load < c.capacity &&
      c.capabilities.includes(requirement.capability) &&
      (requirement.team === undefined || registry.isMember(requirement.team, c.id))
  );
}

/**
 * Picks one distinct resource per requirement. Candidates of each
 * requirement are tried in preference order and the search backtracks, so
 * the result is the first complete assignment in that order, or null when
 * the requirements cannot all be filled at once.
 */
export function matchRequirements(
  options: readonly (readonly ResourceCandidate[])[]
): ResourceCandidate[] | null {
  if (options.some((o) => o.length === 0)) return null;

  const chosen: ResourceCandidate[] = [];
  const used = new Set<string>();

  const search = (i: number): boolean => {
    if (i === options.length) return true;
    for (const candidate of options[i]) {
      if (used.has(candidate.id)) continue;
      used.add(candidate.id);
      chosen.push(candidate);
      if (search(i + 1)) return true;
      used.delete(candidate.id);
      chosen.pop();
    }
    return false;
  };

  return search(0) ? chosen : null;
}

/**
 * Matches idle capacity to allocatable tasks for one step. Allocation is
 * all-or-nothing per task: a task whose requirements cannot all be met
 * gets nothing and is reconsidered next step. Loads committed earlier in
 * the step are visible to later tasks. Pure: runtime state is not touched.
 */
export function allocate(input: AllocationInput): Assignment[] {
  const { tasks, registry, policy } = input;
  const candidates = toCandidates(input.resources);
  const assignments: Assignment[] = [];

  for (const task of tasks) {
    const options = task.definition.requirements.map((req) =>
      eligibleFor(req, candidates, registry).sort(policy.resourceSelection)
    );

    const chosen = matchRequirements(options);
    if (chosen === null) continue;

    for (const candidate of chosen) candidate.load += 1;

    assignments.push({
      taskId: task.id,
      resourceIds: chosen.map((c) => c.id),
      resumed: task.state === "paused",
    });
  }

  return assignments;
}
