import type { Project } from "../core/project";
import type { ResourceRuntime } from "../core/resource";
import { eligibleFor, matchRequirements, toCandidates } from "./scheduler";

export type UnreachableReason =
  | "missing_capability"
  | "unsatisfiable_requirements"
  | "unreachable_predecessor";

export type UnreachableTask = {
  taskId: string;
  reason: UnreachableReason;
  capability?: string;
  team?: string;
  // the unreachable task this one waits on
  via?: string;
  message: string;
};

/**
 * Pre-flight audit. Finds tasks no resource pool could ever staff, and
 * everything downstream of them. Absence calendars are ignored: a resource
 * that is away for a while still counts as able to serve.
 */
export function auditProject(project: Project): UnreachableTask[] {
  const { registry, graph } = project;

  // every resource at full capacity, nothing committed
  const pool: ResourceRuntime[] = registry.allResources().map((definition) => ({
    id: definition.id,
    definition,
    state: "idle",
    assigned: [],
  }));
  const candidates = toCandidates(pool);

  const warnings: UnreachableTask[] = [];
  const unreachable = new Set<string>();

  for (const taskId of graph.topologicalOrder()) {
    const task = registry.task(taskId);
    if (task.initialProgress >= 1) continue;

    const blocker = graph.predecessorsOf(taskId).find((p) => unreachable.has(p));
    if (blocker !== undefined) {
      unreachable.add(taskId);
      warnings.push({
        taskId,
        reason: "unreachable_predecessor",
        via: blocker,
        message: `Task '${taskId}' waits on unreachable task '${blocker}'`,
      });
      continue;
    }

    const options = task.requirements.map((req) => eligibleFor(req, candidates, registry));
    const missing = task.requirements.findIndex((_, i) => options[i].length === 0);
    if (missing !== -1) {
      const req = task.requirements[missing];
      unreachable.add(taskId);
      warnings.push({
        taskId,
        reason: "missing_capability",
        capability: req.capability,
        ...(req.team !== undefined ? { team: req.team } : {}),
        message:
          req.team !== undefined
            ? `No resource in team '${req.team}' has capability '${req.capability}' for task '${taskId}'`
            : `No resource has capability '${req.capability}' for task '${taskId}'`,
      });
      continue;
    }

    if (matchRequirements(options) === null) {
      unreachable.add(taskId);
      warnings.push({
        taskId,
        reason: "unsatisfiable_requirements",
        message: `Task '${taskId}' needs more distinct resources than can serve its requirements at once`,
      });
    }
  }

  return warnings;
}
