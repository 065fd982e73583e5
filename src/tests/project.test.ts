import { describe, it, expect } from "vitest";
import { buildProject, withConfig } from "../core/project";
import { ValidationError } from "../lib/errors";
import type { ProjectInput } from "../schemas/project.schema";
import { makeChain } from "./fixtures";

function makeInput(overrides: Partial<ProjectInput> = {}): ProjectInput {
  return {
    name: "plant",
    workflows: [
      {
        id: "w1",
        tasks: [
          { id: "A", duration: 2, requirements: ["weld"] },
          { id: "B", duration: 1, predecessors: ["A"], requirements: [{ capability: "weld", team: "night" }] },
        ],
      },
      { id: "w2", tasks: [{ id: "C", duration: 3 }] },
    ],
    resources: [
      { id: "r2", capabilities: ["weld"] },
      { id: "r1", capabilities: ["weld", "paint"], capacity: 2 },
    ],
    teams: [{ id: "night", members: ["r2"] }],
    components: [{ id: "frame", producedBy: ["A"], requiredBy: ["C"] }],
    ...overrides,
  };
}

describe("buildProject", () => {
  it("applies defaults and indexes every entity", () => {
    const project = buildProject(makeInput());
    const { registry } = project;

    expect(project.name).toBe("plant");
    expect(project.config.horizon).toBe(10000);
    expect(project.config.stepSize).toBe(1);
    expect(project.config.allocationPolicy).toEqual({
      taskOrder: "topological",
      resourceSelection: "least-loaded",
    });

    expect(registry.task("A").name).toBe("A");
    expect(registry.task("A").requirements).toEqual([{ capability: "weld", team: undefined }]);
    expect(registry.task("C").initialProgress).toBe(0);
    expect(registry.workflowOf("C")).toBe("w2");
    expect(registry.allWorkflows().map((w) => w.id)).toEqual(["w1", "w2"]);
    expect(registry.allTeams().map((t) => t.name)).toEqual(["night"]);
    expect(registry.allResources().map((r) => r.id)).toEqual(["r1", "r2"]);
    expect(registry.resource("r2").capacity).toBe(1);
    expect(registry.isMember("night", "r2")).toBe(true);
    expect(registry.isMember("night", "r1")).toBe(false);
    expect(registry.teamsOf("r2")).toEqual(["night"]);
    expect(registry.componentsProducedBy("A")).toEqual(["frame"]);
    expect(registry.componentsRequiredBy("C")).toEqual(["frame"]);
  });

  it("reports schema violations as ValidationError", () => {
    try {
      buildProject(makeInput({ workflows: [] }));
      expect.unreachable("buildProject should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.message).toMatch(/^Invalid project: workflows: /);
        expect(err.details?.issues).toEqual([
          { path: "workflows", message: expect.any(String) },
        ]);
      }
    }
  });

  it("rejects duplicate task ids across workflows", () => {
    const input = makeInput();
    input.workflows[1].tasks = [{ id: "A", duration: 1 }];
    expect(() => buildProject(input)).toThrow("Duplicate task id: 'A'");
  });

  it("rejects unknown predecessors", () => {
    const input = makeInput();
    input.workflows[1].tasks = [{ id: "C", duration: 1, predecessors: ["Z"] }];
    expect(() => buildProject(input)).toThrow("Task 'C' depends on unknown task 'Z'");
  });

  it("rejects predecessors from another workflow", () => {
    const input = makeInput();
    input.workflows[1].tasks = [{ id: "C", duration: 1, predecessors: ["A"] }];
    expect(() => buildProject(input)).toThrow(
      "Task 'C' in workflow 'w2' depends on 'A' from workflow 'w1'"
    );
  });

  it("rejects unknown teams and team members", () => {
    expect(() => buildProject(makeInput({ teams: [] }))).toThrow(
      "Task 'B' requires unknown team 'night'"
    );
    expect(() =>
      buildProject(makeInput({ teams: [{ id: "night", members: ["ghost"] }] }))
    ).toThrow("Team 'night' lists unknown resource 'ghost'");
  });

  it("rejects components that reference unknown tasks", () => {
    expect(() =>
      buildProject(makeInput({ components: [{ id: "frame", producedBy: ["Q"] }] }))
    ).toThrow("Component 'frame' references unknown task 'Q'");
  });

  it("rejects absences that end before they start", () => {
    expect(() =>
      buildProject(
        makeInput({ resources: [{ id: "r2", capabilities: ["weld"], absences: [{ from: 5, to: 2 }] }] })
      )
    ).toThrow(ValidationError);
  });
});

describe("buildProject: task components and skills", () => {
  it("links a task to the components it lists", () => {
    const project = buildProject(
      makeInput({
        workflows: [
          {
            id: "w1",
            tasks: [
              { id: "A", duration: 2, requirements: ["weld"] },
              { id: "C", duration: 3, components: ["frame", "frame"] },
            ],
          },
        ],
        teams: [],
        components: [{ id: "frame", producedBy: ["A"] }],
      })
    );

    expect(project.registry.componentsRequiredBy("C")).toEqual(["frame"]);
    expect(project.graph.predecessorsOf("C")).toEqual(["A"]);
  });

  it("rejects unknown components on a task", () => {
    expect(() =>
      buildProject(
        makeInput({
          workflows: [{ id: "w1", tasks: [{ id: "A", duration: 2, components: ["nope"] }] }],
          teams: [],
          components: [],
        })
      )
    ).toThrow("Task 'A' requires unknown component 'nope'");
  });

  it("rejects malformed skill distributions", () => {
    expect(() =>
      buildProject(
        makeInput({
          resources: [
            {
              id: "r2",
              capabilities: ["weld"],
              skills: { weld: { distribution: "normal", mean: 1, sd: -1 } },
            },
          ],
        })
      )
    ).toThrow("Resource 'r2' has an invalid output skill for 'weld': normal sd < 0");
  });

  it("rejects negative fixed skills", () => {
    expect(() =>
      buildProject(makeInput({ resources: [{ id: "r2", capabilities: ["weld"], skills: { weld: -1 } }] }))
    ).toThrow(ValidationError);
  });
});

describe("withConfig", () => {
  it("rebuilds the project and leaves the source project untouched", () => {
    const project = makeChain();
    const tighter = withConfig(project, {
      horizon: 4,
      allocationPolicy: { taskOrder: "shortest-task-first" },
    });

    expect(tighter.config.horizon).toBe(4);
    expect(tighter.config.allocationPolicy).toEqual({
      taskOrder: "shortest-task-first",
      resourceSelection: "least-loaded",
    });
    expect(project.config.horizon).toBe(10);
    expect(project.config.allocationPolicy.taskOrder).toBe("topological");
  });
});
