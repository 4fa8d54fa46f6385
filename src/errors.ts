export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "CONFIG_INVALID"
  | "GRAPH_CYCLE"
  | "UNKNOWN_DEPENDENCY"
  | "ROLE_UNAVAILABLE"
  | "TIMEOUT"
  | "RATE_LIMITED"
  | "NETWORK"
  | "UPSTREAM_UNAVAILABLE"
  | "UPSTREAM_REJECTED"
  | "MALFORMED_RESPONSE"
  | "MERGE_FAILED"
  | "DEPENDENCY_FAILED"
  | "CANCELLED"
  | "INTERRUPTED"
  | "TASK_NOT_FOUND"
  | "TASK_TERMINAL"
  | "QUEUE_FULL"
  | "INTERNAL";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

/** Bad request shape. Rejected before any task exists; never retried. */
export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ValidationError";
  }
}

/** Programmer error in pipeline or orchestrator configuration. */
export class ConfigError extends OrchestratorError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ConfigError";
  }
}

/** Retryable collaborator failure: timeout, rate limit, transient network fault. */
export class TransientError extends OrchestratorError {
  /** Delay the collaborator asked for before the next attempt. */
  readonly retryAfterMs?: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(code, message, options);
    this.name = "TransientError";
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Non-retryable collaborator failure. */
export class FatalError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "FatalError";
  }
}

export class CancellationError extends OrchestratorError {
  constructor(message = "Task cancelled") {
    super("CANCELLED", message);
    this.name = "CancellationError";
  }
}

export class TaskNotFoundError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `Task "${taskId}" not found`);
    this.name = "TaskNotFoundError";
    this.taskId = taskId;
  }
}

export class TaskTerminalError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string, status: string) {
    super("TASK_TERMINAL", `Task "${taskId}" is already ${status}`);
    this.name = "TaskTerminalError";
    this.taskId = taskId;
  }
}

/** The two buckets every collaborator failure is sorted into, plus cancellation. */
export type UnitError = TransientError | FatalError | CancellationError;

export function isUnitError(err: unknown): err is UnitError {
  return err instanceof TransientError || err instanceof FatalError || err instanceof CancellationError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
