// core
export * from "./core/task";
export * from "./core/resource";
export * from "./core/registry";
export * from "./core/project";

// schemas
export * from "./schemas/config.schema";
export * from "./schemas/project.schema";

// engine
export * from "./engine/random";
export * from "./engine/duration";
export * from "./engine/log";
export * from "./engine/graph";
export * from "./engine/critical-path";
export * from "./engine/policy";
export * from "./engine/scheduler";
export * from "./engine/calendar";
export * from "./engine/metrics";
export * from "./engine/tick";
export * from "./engine/simulation";
export * from "./engine/audit";
export * from "./engine/trials";
export * from "./engine/report";

// worker
export * from "./worker/protocol";
export * from "./worker/pool";

// lib
export * from "./lib/errors";
export { createLogger, getDefaultLogger } from "./lib/logger";

// types
export type { SimulationState } from "./core/state";
export type { ComponentRuntime } from "./core/component";
export type { ResourceUtilization, TrialCost } from "./core/metrics";
export type { Logger } from "./lib/logger";
