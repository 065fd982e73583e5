import { buildProject, type Project } from "../core/project";
import type { ProjectInput } from "../schemas/project.schema";
import type { SimulationConfigInput } from "../schemas/config.schema";
import { createLogger } from "../lib/logger";

export const silentLogger = createLogger({ level: "silent" });

type TaskInput = ProjectInput["workflows"][number]["tasks"][number];
type ResourceInput = NonNullable<ProjectInput["resources"]>[number];

export function makeProject(
  tasks: TaskInput[],
  resources: ResourceInput[] = [{ id: "r1", capabilities: ["build"] }],
  config: SimulationConfigInput = {},
  overrides: Partial<ProjectInput> = {}
): Project {
  return buildProject({
    name: "test",
    workflows: [{ id: "w1", tasks }],
    resources,
    config,
    ...overrides,
  });
}

// A(3) -> B(2), one builder
export function makeChain(config: SimulationConfigInput = { horizon: 10 }): Project {
  return makeProject(
    [
      { id: "A", duration: 3, requirements: ["build"] },
      { id: "B", duration: 2, predecessors: ["A"], requirements: ["build"] },
    ],
    undefined,
    config
  );
}

// A(2) and C(5), independent, competing for one builder
export function makeContention(config: SimulationConfigInput = {}): Project {
  return makeProject(
    [
      { id: "A", duration: 2, requirements: ["build"] },
      { id: "C", duration: 5, requirements: ["build"] },
    ],
    undefined,
    config
  );
}

// stochastic, multi-resource project with absences and a component
export function makeStochastic(seed = 42): Project {
  return buildProject({
    name: "stochastic",
    workflows: [
      {
        id: "frame",
        tasks: [
          { id: "f1", duration: { distribution: "uniform", min: 1, max: 6 }, requirements: ["build"] },
          {
            id: "f2",
            duration: { distribution: "triangular", min: 2, mode: 3, max: 8 },
            predecessors: ["f1"],
            requirements: ["build", "inspect"],
          },
          {
            id: "f3",
            duration: { distribution: "normal", mean: 4, sd: 2 },
            predecessors: ["f1"],
            requirements: ["build"],
          },
        ],
      },
      {
        id: "fitout",
        tasks: [
          { id: "g1", duration: { distribution: "lognormal", p50: 3, p90: 6 }, requirements: ["paint"] },
          { id: "g2", duration: 0, predecessors: ["g1"] },
          { id: "g3", duration: 2, predecessors: ["g2"], requirements: ["build"] },
        ],
      },
    ],
    resources: [
      { id: "alice", capabilities: ["build", "inspect"], absences: [{ from: 3, to: 5 }] },
      { id: "bob", capabilities: ["build", "paint"], capacity: 2 },
      { id: "carol", capabilities: ["inspect", "paint"] },
    ],
    components: [{ id: "shell", producedBy: ["f2"], requiredBy: ["g3"] }],
    config: { randomSeed: seed },
  });
}

