import { buildProject, type Project } from "../core/project";
import { HorizonExceededError, InvalidDistributionParameters } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { ExecutionLog, type LogEntry } from "../engine/log";
import { simulate, type TrialError, type TrialResult } from "../engine/simulation";
import type { ProjectInput } from "../schemas/project.schema";

export type WorkerRequest =
  | { type: "INIT"; payload: { definition: ProjectInput } }
  | { type: "RUN_TRIAL"; payload: { trial: number; seed: number } };

export type SerializedTrialError =
  | { name: "HorizonExceededError"; horizon: number; unfinishedTaskIds: string[] }
  | {
      name: "InvalidDistributionParameters";
      taskId: string;
      reason: string;
      details: Record<string, unknown>;
    };

export type SerializedTrialResult = Omit<TrialResult, "log" | "error"> & {
  log: LogEntry[];
  error?: SerializedTrialError;
};

export type WorkerResponse =
  | { type: "READY" }
  | { type: "TRIAL_RESULT"; payload: SerializedTrialResult }
  | { type: "ERROR"; payload: { trial: number | null; name: string; message: string } };

function serializeError(error: TrialError): SerializedTrialError {
  if (error instanceof HorizonExceededError) {
    return {
      name: "HorizonExceededError",
      horizon: error.horizon,
      unfinishedTaskIds: error.unfinishedTaskIds,
    };
  }
  return {
    name: "InvalidDistributionParameters",
    taskId: error.taskId,
    reason: error.reason,
    details: error.details,
  };
}

function deserializeError(trial: number, error: SerializedTrialError): TrialError {
  switch (error.name) {
    case "HorizonExceededError":
      return new HorizonExceededError(trial, error.horizon, error.unfinishedTaskIds);
    case "InvalidDistributionParameters":
      return new InvalidDistributionParameters(error.taskId, error.reason, error.details);
  }
}

export function serializeTrial(result: TrialResult): SerializedTrialResult {
  const { log, error, ...rest } = result;
  return {
    ...rest,
    log: log.toJSON(),
    ...(error ? { error: serializeError(error) } : {}),
  };
}

export function deserializeTrial(payload: SerializedTrialResult): TrialResult {
  const { log, error, ...rest } = payload;
  return {
    ...rest,
    log: ExecutionLog.from(log),
    ...(error ? { error: deserializeError(rest.trial, error) } : {}),
  };
}

/**
 * Message handler behind a trial worker. INIT builds the project once;
 * each RUN_TRIAL simulates one seeded trial against it. Failures are
 * answered with an ERROR message for the parent to reject on.
 */
export function createTrialHandler(logger: Logger): (msg: WorkerRequest) => WorkerResponse {
  let project: Project | null = null;

  return (msg) => {
    const trial = msg.type === "RUN_TRIAL" ? msg.payload.trial : null;
    try {
      switch (msg.type) {
        case "INIT": {
          project = buildProject(msg.payload.definition);
          return { type: "READY" };
        }

        case "RUN_TRIAL": {
          if (project === null) {
            throw new Error("RUN_TRIAL received before INIT");
          }
          const result = simulate(project, {
            trial: msg.payload.trial,
            seed: msg.payload.seed,
            logger,
          });
          return { type: "TRIAL_RESULT", payload: serializeTrial(result) };
        }
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ err: error, trial }, "worker request failed");
      return { type: "ERROR", payload: { trial, name: error.name, message: error.message } };
    }
  };
}
