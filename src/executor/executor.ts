import type { AgentGateway } from "../agents/gateway.js";
import type { AgentRole, RoleRequest, RoleResponse } from "../agents/roles.js";
import { getConfig } from "../config.js";
import {
  CancellationError,
  FatalError,
  OrchestratorError,
  TransientError,
  isUnitError,
  type UnitError,
} from "../errors.js";
import type { PipelineMetrics } from "../metrics.js";
import type { StageContext, StageDefinition, UnitSuccess, UnitTelemetry } from "../pipeline/types.js";
import { anySignal, fanOutController, whenAborted } from "../utils/abort.js";
import type { ConcurrencyBudget, Release } from "../utils/concurrency-budget.js";
import { log } from "../utils/logger.js";
import { backoffDelay, retryPolicy, sleep as defaultSleep, type RetryPolicy } from "../utils/retry.js";
import type { StageResult, StageRunOptions, UnitResult, UnitRunOptions } from "./types.js";

export type StageExecutorOptions = {
  gateway: AgentGateway;
  /** Global budget shared by every task. */
  budget: ConcurrencyBudget;
  retry?: RetryPolicy;
  unitTimeoutMs?: number;
  /** Replaces the backoff timer. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Receives every collaborator call. */
  metrics?: PipelineMetrics;
};

type AttemptOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "error"; error: TransientError | FatalError }
  | { status: "cancelled" };

const execLog = log.child("executor");

function toUnitError(err: unknown, fallback: "DEPENDENCY_FAILED" | "MERGE_FAILED" | "INTERNAL"): UnitError {
  if (isUnitError(err)) return err;
  if (err instanceof OrchestratorError) return new FatalError(err.code, err.message, { cause: err });
  return new FatalError(fallback, err instanceof Error ? err.message : String(err), { cause: err });
}

export function describeUnitError(error: UnitError): NonNullable<UnitTelemetry["error"]> {
  return { errorClass: error.name, code: error.code, message: error.message };
}

/**
 * Runs one stage's fan-out: every unit takes a slot from the per-task and the
 * global budget, is bounded by a timeout and retried with exponential backoff
 * on transient failures.
 */
export class StageExecutor {
  private gateway: AgentGateway;
  private budget: ConcurrencyBudget;
  private policy: RetryPolicy;
  private unitTimeoutMs: number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private metrics?: PipelineMetrics;

  constructor(opts: StageExecutorOptions) {
    this.gateway = opts.gateway;
    this.budget = opts.budget;
    this.policy = opts.retry ?? retryPolicy();
    this.unitTimeoutMs = opts.unitTimeoutMs ?? getConfig().timeouts.unitMs;
    this.sleep = opts.sleep ?? defaultSleep;
    this.metrics = opts.metrics;
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  async runStage(stage: StageDefinition, ctx: StageContext, opts: StageRunOptions = {}): Promise<StageResult> {
    const start = Date.now();

    let requests: Array<RoleRequest<AgentRole>>;
    try {
      requests = stage.units(ctx);
    } catch (err) {
      return { stage: stage.name, status: "failed", error: toUnitError(err, "DEPENDENCY_FAILED"), units: [], durationMs: 0 };
    }

    execLog.info(`Running stage "${stage.name}"`, { taskId: ctx.taskId, units: requests.length, required: stage.required });

    // Aborted on the first terminal failure of a required stage to stop siblings.
    const stageController = fanOutController();
    const cancel = anySignal([opts.signal, stageController.signal]);
    const abandonSignal = stage.required ? stageController.signal : cancel.signal;

    let firstFailure: UnitError | undefined;
    const successes: Array<UnitSuccess<RoleResponse<AgentRole>>> = [];

    const units = await Promise.all(
      requests.map(async (request, index) => {
        const result = await this.invokeUnit(stage.role, request, {
          taskId: ctx.taskId,
          index,
          cancelSignal: cancel.signal,
          abandonSignal,
          taskBudget: opts.taskBudget,
        });

        if (result.status === "ok") {
          successes.push({ index, value: result.value });
        } else if (!firstFailure) {
          firstFailure = result.error;
          if (stage.required) stageController.abort();
        }

        opts.onUnitEnd?.(stage.name, result.telemetry);
        return result.telemetry;
      }),
    ).finally(() => cancel.dispose());

    const durationMs = Date.now() - start;

    if (opts.signal?.aborted) {
      return { stage: stage.name, status: "failed", error: new CancellationError(), units, durationMs };
    }

    const allFailed = requests.length > 0 && successes.length === 0;
    if (firstFailure && (stage.required || allFailed)) {
      execLog.warn(`Stage "${stage.name}" failed`, { taskId: ctx.taskId, code: firstFailure.code });
      return { stage: stage.name, status: "failed", error: firstFailure, units, durationMs };
    }

    if (firstFailure) {
      execLog.warn(`Optional stage "${stage.name}" dropped ${requests.length - successes.length} unit(s)`, {
        taskId: ctx.taskId,
      });
    }

    try {
      const output = stage.merge(successes, ctx);
      return { stage: stage.name, status: "done", output, units, durationMs };
    } catch (err) {
      return { stage: stage.name, status: "failed", error: toUnitError(err, "MERGE_FAILED"), units, durationMs };
    }
  }

  /** Run one unit of work under the retry policy, timeout and budgets. */
  async invokeUnit<R extends AgentRole>(
    role: R,
    request: RoleRequest<R>,
    opts: UnitRunOptions,
  ): Promise<UnitResult<RoleResponse<R>>> {
    const start = Date.now();
    const wait = anySignal([opts.cancelSignal, opts.abandonSignal]);
    const waitSignal = wait.signal;
    const telemetry: UnitTelemetry = {
      index: opts.index ?? 0,
      status: "ok",
      attempts: 0,
      delaysMs: [],
      durationMs: 0,
    };

    const fail = (error: UnitError): UnitResult<RoleResponse<R>> => {
      telemetry.status = error instanceof CancellationError ? "cancelled" : "failed";
      telemetry.error = describeUnitError(error);
      telemetry.durationMs = Date.now() - start;
      return { status: "failed", error, telemetry };
    };

    try {
      for (let attempt = 1; ; attempt++) {
        if (waitSignal.aborted) return fail(new CancellationError());

        let releaseTask: Release | undefined;
        let releaseGlobal: Release;
        try {
          releaseTask = await opts.taskBudget?.acquire(waitSignal);
          releaseGlobal = await this.budget.acquire(waitSignal);
        } catch (err) {
          releaseTask?.();
          return fail(toUnitError(err, "INTERNAL"));
        }

        telemetry.attempts = attempt;
        let outcome: AttemptOutcome<RoleResponse<R>>;
        try {
          outcome = await this.attempt(role, request, opts, attempt);
        } finally {
          releaseGlobal();
          releaseTask?.();
        }

        if (outcome.status === "ok") {
          telemetry.durationMs = Date.now() - start;
          return { status: "ok", value: outcome.value, telemetry };
        }
        if (outcome.status === "cancelled") return fail(new CancellationError());

        const { error } = outcome;
        if (attempt >= this.policy.maxAttempts || !this.policy.isRetryable(error)) {
          execLog.debug(`Unit ${telemetry.index} of ${role} escalated`, {
            taskId: opts.taskId,
            attempt,
            code: error.code,
          });
          return fail(error);
        }

        const retryAfterMs = error instanceof TransientError ? error.retryAfterMs : undefined;
        const delay = backoffDelay(this.policy, attempt, retryAfterMs, telemetry.delaysMs.at(-1));
        telemetry.delaysMs.push(delay);
        execLog.debug(`Retrying unit ${telemetry.index} of ${role}`, { taskId: opts.taskId, attempt, delayMs: delay });
        try {
          await this.sleep(delay, waitSignal);
        } catch (err) {
          return fail(toUnitError(err, "INTERNAL"));
        }
      }
    } finally {
      wait.dispose();
    }
  }

  /** One gateway call bounded by the unit timeout. */
  private async attempt<R extends AgentRole>(
    role: R,
    request: RoleRequest<R>,
    opts: UnitRunOptions,
    attempt: number,
  ): Promise<AttemptOutcome<RoleResponse<R>>> {
    const timeoutMs = opts.timeoutMs ?? this.unitTimeoutMs;
    const started = Date.now();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbandon = () => controller.abort();
    opts.abandonSignal?.addEventListener("abort", onAbandon, { once: true });
    if (opts.abandonSignal?.aborted) controller.abort();

    try {
      // Backends that ignore the signal are still cut off here.
      const raced = await Promise.race([
        this.gateway.invoke(role, request, { taskId: opts.taskId, attempt, signal: controller.signal }),
        whenAborted(controller.signal, () => ({ status: "cancelled" as const, durationMs: 0 })),
      ]);

      let outcome: AttemptOutcome<RoleResponse<R>>;
      if (timedOut) {
        outcome = { status: "error", error: new TransientError("TIMEOUT", `${role} unit timed out after ${timeoutMs}ms`) };
      } else if (raced.status === "ok") {
        outcome = { status: "ok", value: raced.value };
      } else if (raced.status === "error") {
        outcome = { status: "error", error: raced.error };
      } else {
        outcome = { status: "cancelled" };
      }
      this.metrics?.recordCall(role, outcome.status, Date.now() - started);
      return outcome;
    } finally {
      clearTimeout(timer);
      opts.abandonSignal?.removeEventListener("abort", onAbandon);
    }
  }
}
