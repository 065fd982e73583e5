import { CyclicWorkflowError } from "../lib/errors";
import { compareIds, type EntityRegistry } from "../core/registry";
import { isAllocatable, type TaskRuntime } from "../core/task";
import type { SimulationState } from "../core/state";
import type { TaskComparator } from "./policy";
import { computeTimings, type TaskSpan } from "./critical-path";
import { plannedDuration } from "./duration";

function insertSorted(queue: string[], id: string): void {
  let lo = 0;
  let hi = queue.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareIds(queue[mid], id) < 0) lo = mid + 1;
    else hi = mid;
  }
  queue.splice(lo, 0, id);
}

/**
 * Precedence DAG over every task of a project. Edges are the explicit
 * predecessors plus producer -> consumer edges induced by components.
 * Immutable once built, so one graph serves every trial.
 */
export class WorkflowGraph {
  private readonly preds = new Map<string, string[]>();
  private readonly succs = new Map<string, string[]>();
  private readonly order: string[];
  private readonly position = new Map<string, number>();
  private readonly descendants = new Map<string, number>();
  private plannedSlack: Map<string, number> | null = null;

  constructor(
    private readonly registry: EntityRegistry,
    private readonly stepSize = 1
  ) {
    for (const task of registry.allTasks()) {
      this.preds.set(task.id, []);
      this.succs.set(task.id, []);
    }

    for (const task of registry.allTasks()) {
      const edges = new Set(task.predecessors);
      for (const componentId of registry.componentsRequiredBy(task.id)) {
        for (const producer of registry.component(componentId).producedBy) {
          edges.add(producer);
        }
      }
      const sorted = [...edges].sort(compareIds);
      this.preds.set(task.id, sorted);
      for (const predId of sorted) {
        this.succs.get(predId)?.push(task.id);
      }
    }
    for (const list of this.succs.values()) list.sort(compareIds);

    this.order = this.topologicalSort();
    this.order.forEach((id, i) => this.position.set(id, i));

    const reach = new Map<string, Set<string>>();
    for (const id of [...this.order].reverse()) {
      const below = new Set<string>();
      for (const succId of this.successorsOf(id)) {
        below.add(succId);
        for (const d of reach.get(succId) ?? []) below.add(d);
      }
      reach.set(id, below);
      this.descendants.set(id, below.size);
    }
  }

  private topologicalSort(): string[] {
    // Kahn's algorithm; the queue stays sorted so ties break by id
    const inDegree = new Map<string, number>();
    const queue: string[] = [];
    for (const [id, preds] of this.preds) {
      inDegree.set(id, preds.length);
      if (preds.length === 0) insertSorted(queue, id);
    }

    const sorted: string[] = [];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      sorted.push(id);
      for (const succId of this.successorsOf(id)) {
        const deg = (inDegree.get(succId) ?? 0) - 1;
        inDegree.set(succId, deg);
        if (deg === 0) insertSorted(queue, succId);
      }
    }

    if (sorted.length !== this.preds.size) {
      const done = new Set(sorted);
      const remaining = [...this.preds.keys()].filter((id) => !done.has(id)).sort(compareIds);
      throw new CyclicWorkflowError(this.findCycle(remaining, done));
    }
    return sorted;
  }

  private findCycle(remaining: string[], done: Set<string>): string[] {
    // every unsorted node still has an unsorted predecessor, so walking
    // predecessors from any of them must revisit a node
    const seenAt = new Map<string, number>();
    const path: string[] = [];
    let current: string | undefined = remaining[0];

    while (current !== undefined && !seenAt.has(current)) {
      seenAt.set(current, path.length);
      path.push(current);
      current = this.predecessorsOf(current).find((p) => !done.has(p));
    }
    if (current === undefined) return remaining;

    const cycle = path.slice(seenAt.get(current)).reverse();
    const smallest = [...cycle].sort(compareIds)[0];
    const at = cycle.indexOf(smallest);
    return [...cycle.slice(at), ...cycle.slice(0, at)];
  }

  topologicalOrder(): readonly string[] {
    return this.order;
  }

  topoIndex(taskId: string): number {
    return this.position.get(taskId) ?? Number.MAX_SAFE_INTEGER;
  }

  predecessorsOf(taskId: string): readonly string[] {
    return this.preds.get(taskId) ?? [];
  }

  successorsOf(taskId: string): readonly string[] {
    return this.succs.get(taskId) ?? [];
  }

  descendantCount(taskId: string): number {
    return this.descendants.get(taskId) ?? 0;
  }

  plannedFloat(taskId: string): number {
    if (this.plannedSlack === null) {
      const durations = new Map<string, number>();
      for (const task of this.registry.allTasks()) {
        const work = Math.ceil(plannedDuration(task.duration) * (1 - task.initialProgress));
        durations.set(task.id, work);
      }
      const timings = computeTimings(this, this.plannedSpans(durations), this.stepSize);
      this.plannedSlack = new Map(timings.map((t) => [t.taskId, t.float]));
    }
    return this.plannedSlack.get(taskId) ?? 0;
  }

  // unconstrained schedule: each task starts the step after its last predecessor
  plannedSpans(work: Map<string, number>): Map<string, TaskSpan> {
    const spans = new Map<string, TaskSpan>();
    for (const id of this.order) {
      let start = this.stepSize;
      for (const predId of this.predecessorsOf(id)) {
        const pred = spans.get(predId);
        if (pred) start = Math.max(start, pred.finish + this.stepSize);
      }
      const steps = Math.max(1, Math.ceil((work.get(id) ?? 0) / this.stepSize));
      spans.set(id, { start, finish: start + (steps - 1) * this.stepSize });
    }
    return spans;
  }

  /**
   * Promotes every not_ready task whose prerequisites are met to ready,
   * then returns the allocatable (ready or paused) tasks in policy order.
   */
  readyTasks(state: SimulationState, compare: TaskComparator): TaskRuntime[] {
    for (const task of state.tasks.values()) {
      if (task.state !== "not_ready" || !this.prerequisitesMet(task, state)) continue;
      task.state = "ready";
      task.readyAt = state.time;
      state.log.append({ time: state.time, kind: "ready", taskId: task.id, resourceId: null });
    }

    return [...state.tasks.values()]
      .filter(isAllocatable)
      .sort((a, b) => compare(a, b, this));
  }

  isComplete(state: SimulationState): boolean {
    for (const task of state.tasks.values()) {
      if (task.state !== "finished") return false;
    }
    return true;
  }

  private prerequisitesMet(task: TaskRuntime, state: SimulationState): boolean {
    for (const predId of task.definition.predecessors) {
      if (state.tasks.get(predId)?.state !== "finished") return false;
    }
    for (const componentId of this.registry.componentsRequiredBy(task.id)) {
      if (!state.components.get(componentId)?.ready) return false;
    }
    return true;
  }
}
