import { parentPort, threadId } from "node:worker_threads";
import { createLogger } from "../lib/logger";
import { createTrialHandler, type WorkerRequest } from "./protocol";

const handle = createTrialHandler(createLogger({ base: { threadId } }));

parentPort?.on("message", (msg: WorkerRequest) => {
  parentPort?.postMessage(handle(msg));
});
