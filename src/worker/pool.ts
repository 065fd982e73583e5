import { availableParallelism } from "node:os";
import { Worker } from "node:worker_threads";
import type { Project } from "../core/project";
import { getDefaultLogger } from "../lib/logger";
import { auditProject } from "../engine/audit";
import { deriveSeed } from "../engine/random";
import type { TrialResult } from "../engine/simulation";
import { summarize, type RunOptions, type TrialResults } from "../engine/trials";
import { deserializeTrial, type WorkerRequest, type WorkerResponse } from "./protocol";

/** The part of a worker thread the pool talks to. */
export type TrialWorker = {
  postMessage(msg: WorkerRequest): void;
  once(event: "message", listener: (response: WorkerResponse) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  off(event: "message", listener: (response: WorkerResponse) => void): unknown;
  off(event: "error", listener: (err: Error) => void): unknown;
  terminate(): Promise<unknown>;
};

export type ParallelRunOptions = Omit<RunOptions, "policy"> & {
  concurrency?: number;
  // compiled worker entry; defaults to the bundled dist/worker.js
  workerUrl?: URL;
  createWorker?: () => TrialWorker;
};

function request(worker: TrialWorker, msg: WorkerRequest): Promise<WorkerResponse> {
  return new Promise((resolve, reject) => {
    const onMessage = (response: WorkerResponse) => {
      worker.off("error", onError);
      if (response.type === "ERROR") {
        const { trial, name, message } = response.payload;
        reject(new Error(`Worker failed${trial === null ? "" : ` on trial ${trial}`}: ${name}: ${message}`));
        return;
      }
      resolve(response);
    };
    const onError = (err: Error) => {
      worker.off("message", onMessage);
      reject(err);
    };
    worker.once("message", onMessage);
    worker.once("error", onError);
    worker.postMessage(msg);
  });
}

/**
 * Same trials as run(), fanned out over worker threads. Trials share
 * nothing, so results are merged only after each completes and match a
 * sequential run with the same seed. Custom policy functions cannot cross
 * the thread boundary; workers use the project's configured policy.
 */
export async function runParallel(
  project: Project,
  options: ParallelRunOptions = {}
): Promise<TrialResults> {
  const count = options.trials ?? 1;
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Trial count must be a positive integer, got ${count}`);
  }
  const logger = options.logger ?? getDefaultLogger();
  const seed = project.config.randomSeed;
  const concurrency = Math.max(1, Math.min(options.concurrency ?? availableParallelism(), count));
  const createWorker: () => TrialWorker =
    options.createWorker ??
    (() => new Worker(options.workerUrl ?? new URL("./worker.js", import.meta.url)));

  const warnings = auditProject(project);
  for (const warning of warnings) {
    logger.warn({ taskId: warning.taskId, reason: warning.reason }, warning.message);
  }

  const results: TrialResult[] = [];
  let next = 0;

  const drive = async (worker: TrialWorker): Promise<void> => {
    await request(worker, { type: "INIT", payload: { definition: project.definition } });
    while (next < count && !options.signal?.aborted) {
      const trial = next++;
      const response = await request(worker, {
        type: "RUN_TRIAL",
        payload: { trial, seed: deriveSeed(seed, trial) },
      });
      if (response.type === "TRIAL_RESULT") {
        results.push(deserializeTrial(response.payload));
      }
    }
  };

  const workers = Array.from({ length: concurrency }, createWorker);
  try {
    await Promise.all(workers.map(drive));
  } finally {
    await Promise.all(workers.map((w) => w.terminate()));
  }

  results.sort((a, b) => a.trial - b.trial);
  const summary = summarize(project, results);
  logger.info(
    { project: project.name, trials: summary.trials, completed: summary.completed, concurrency },
    "parallel run finished"
  );

  return { project: project.name, seed, warnings, trials: results, summary };
}
