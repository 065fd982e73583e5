import { describe, it, expect } from "vitest";
import { simulate } from "../engine/simulation";
import { HorizonExceededError, InvalidDistributionParameters } from "../lib/errors";
import type { ProjectInput } from "../schemas/project.schema";
import { createTrialHandler, deserializeTrial, serializeTrial } from "../worker/protocol";
import { makeChain, makeProject, silentLogger } from "./fixtures";

const definition: ProjectInput = {
  name: "chain",
  workflows: [
    {
      id: "w1",
      tasks: [
        { id: "A", duration: 3, requirements: ["build"] },
        { id: "B", duration: 2, predecessors: ["A"], requirements: ["build"] },
      ],
    },
  ],
  resources: [{ id: "r1", capabilities: ["build"] }],
  config: { horizon: 10 },
};

describe("trial worker protocol", () => {
  it("refuses trials before the project is loaded", () => {
    const handle = createTrialHandler(silentLogger);
    expect(handle({ type: "RUN_TRIAL", payload: { trial: 0, seed: 1 } })).toEqual({
      type: "ERROR",
      payload: { trial: 0, name: "Error", message: "RUN_TRIAL received before INIT" },
    });
  });

  it("runs a trial against the loaded project", () => {
    const handle = createTrialHandler(silentLogger);
    expect(handle({ type: "INIT", payload: { definition } })).toEqual({ type: "READY" });

    const response = handle({ type: "RUN_TRIAL", payload: { trial: 2, seed: 9 } });
    expect(response.type).toBe("TRIAL_RESULT");
    if (response.type !== "TRIAL_RESULT") return;

    const local = simulate(makeChain(), { trial: 2, seed: 9, logger: silentLogger });
    const remote = deserializeTrial(response.payload);
    expect(remote.trial).toBe(2);
    expect(remote.duration).toBe(5);
    expect(remote.log.toJSON()).toEqual(local.log.toJSON());
    expect(remote.criticalPath).toEqual(local.criticalPath);
  });

  it("forwards project errors", () => {
    const handle = createTrialHandler(silentLogger);
    const cyclic: ProjectInput = {
      workflows: [{ id: "w1", tasks: [{ id: "A", duration: 1, predecessors: ["A"] }] }],
    };
    expect(handle({ type: "INIT", payload: { definition: cyclic } })).toEqual({
      type: "ERROR",
      payload: {
        trial: null,
        name: "CyclicWorkflowError",
        message: "Precedence cycle detected: A -> A",
      },
    });
  });

  it("round-trips horizon overruns through plain data", () => {
    const result = simulate(makeChain({ horizon: 4 }), { trial: 1, logger: silentLogger });
    const payload = serializeTrial(result);

    expect(payload.error).toEqual({
      name: "HorizonExceededError",
      horizon: 4,
      unfinishedTaskIds: ["B"],
    });
    expect(JSON.parse(JSON.stringify(payload.log))).toEqual(payload.log);

    const restored = deserializeTrial(payload);
    expect(restored.error).toBeInstanceOf(HorizonExceededError);
    expect(restored.error?.message).toBe(result.error?.message);
  });

  it("round-trips rejected draws through plain data", () => {
    const project = makeProject(
      [
        {
          id: "A",
          duration: 3,
          dailyOutput: { distribution: "normal", mean: -50, sd: 0 },
          requirements: ["build"],
        },
      ],
      undefined,
      { durationMode: "variable-daily-output", negativeDurations: "reject" }
    );
    const result = simulate(project, { trial: 3, logger: silentLogger });
    const payload = serializeTrial(result);

    expect(payload.status).toBe("invalid_duration");
    expect(payload.error).toEqual({
      name: "InvalidDistributionParameters",
      taskId: "A",
      reason: "sampled negative work amount -50",
      details: { sampled: -50 },
    });

    const restored = deserializeTrial(payload);
    expect(restored.error).toBeInstanceOf(InvalidDistributionParameters);
    expect(restored.error?.message).toBe(
      "Task 'A' has an invalid duration: sampled negative work amount -50"
    );
    expect(restored.log.toJSON()).toEqual(result.log.toJSON());
  });
});
