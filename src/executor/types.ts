import type { UnitError } from "../errors.js";
import type { PipelineOutputs, UnitTelemetry } from "../pipeline/types.js";
import type { ConcurrencyBudget } from "../utils/concurrency-budget.js";

export type StageResult =
  | {
      stage: string;
      status: "done";
      output: Partial<PipelineOutputs>;
      units: UnitTelemetry[];
      durationMs: number;
    }
  | {
      stage: string;
      status: "failed";
      error: UnitError;
      units: UnitTelemetry[];
      durationMs: number;
    };

export type UnitResult<T> =
  | { status: "ok"; value: T; telemetry: UnitTelemetry }
  | { status: "failed"; error: UnitError; telemetry: UnitTelemetry };

export type StageRunOptions = {
  /** Task cancellation. Stops new attempts; aborts in-flight calls of optional stages. */
  signal?: AbortSignal;
  /** Per-task budget, acquired before a global slot. */
  taskBudget?: ConcurrencyBudget;
  onUnitEnd?: (stage: string, telemetry: UnitTelemetry) => void;
};

export type UnitRunOptions = {
  taskId: string;
  /** Position of the unit in its stage's fan-out. */
  index?: number;
  /** Stops new attempts, slot waits and backoff sleeps. */
  cancelSignal?: AbortSignal;
  /** Additionally aborts the call in flight. */
  abandonSignal?: AbortSignal;
  taskBudget?: ConcurrencyBudget;
  timeoutMs?: number;
};
