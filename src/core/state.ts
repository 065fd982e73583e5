import type { TaskRuntime } from "./task";
import type { ResourceRuntime } from "./resource";
import type { ComponentRuntime } from "./component";
import type { ExecutionLog } from "../engine/log";

export type SimulationState = {
  time: number;
  steps: number;

  // insertion order is topological for tasks and by id for resources
  tasks: Map<string, TaskRuntime>;
  resources: Map<string, ResourceRuntime>;
  components: Map<string, ComponentRuntime>;

  log: ExecutionLog;

  costSeries: number[];
  loadSeries: Map<string, number[]>;
};
