import type { ZodError } from "zod";

export type ValidationIssue = {
  path: string;
  message: string;
};

export class ValidationError extends Error {
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }

  static fromZod(error: ZodError, subject: string): ValidationError {
    const issues: ValidationIssue[] = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const first = issues[0];
    const summary = first
      ? `${first.path || "(root)"}: ${first.message}`
      : "invalid input";
    return new ValidationError(`Invalid ${subject}: ${summary}`, { issues });
  }
}

export class CyclicWorkflowError extends Error {
  public cycle: string[];

  constructor(cycle: string[]) {
    super(`Precedence cycle detected: ${[...cycle, cycle[0]].join(" -> ")}`);
    this.name = "CyclicWorkflowError";
    this.cycle = cycle;
  }
}

export class InvalidDistributionParameters extends Error {
  public taskId: string;
  public reason: string;
  public details: Record<string, unknown>;

  constructor(taskId: string, reason: string, details: Record<string, unknown> = {}) {
    super(`Task '${taskId}' has an invalid duration: ${reason}`);
    this.name = "InvalidDistributionParameters";
    this.taskId = taskId;
    this.reason = reason;
    this.details = details;
  }
}

export class HorizonExceededError extends Error {
  public trial: number;
  public horizon: number;
  public unfinishedTaskIds: string[];

  constructor(trial: number, horizon: number, unfinishedTaskIds: string[]) {
    super(
      `Trial ${trial} did not finish within horizon ${horizon}; ` +
        `${unfinishedTaskIds.length} task(s) unfinished: ${unfinishedTaskIds.join(", ")}`
    );
    this.name = "HorizonExceededError";
    this.trial = trial;
    this.horizon = horizon;
    this.unfinishedTaskIds = unfinishedTaskIds;
  }
}
