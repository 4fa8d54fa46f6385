import type { AgentGateway } from "./agents/gateway.js";
import { getConfig } from "./config.js";
import { CancellationError, FatalError, OrchestratorError, errorMessage } from "./errors.js";
import { StageExecutor } from "./executor/executor.js";
import type { StageResult } from "./executor/types.js";
import { PipelineMetrics, type MetricsSnapshot, type TaskOutcome } from "./metrics.js";
import { createDocumentPipeline } from "./pipeline/document-pipeline.js";
import type { PipelineGraph } from "./pipeline/graph.js";
import type { StageContext, StageDefinition, TaskConfig, TaskSnapshot, TaskStatus } from "./pipeline/types.js";
import { ProgressBus, type ProgressListener } from "./progress.js";
import { parseOrThrow, submitRequestSchema } from "./schemas.js";
import { isTerminal } from "./state/persistence.js";
import { TaskStateStore } from "./state/store.js";
import { fanOutController } from "./utils/abort.js";
import { ConcurrencyBudget } from "./utils/concurrency-budget.js";
import { log } from "./utils/logger.js";
import type { RetryPolicy } from "./utils/retry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OrchestratorOptions = {
  gateway: AgentGateway;
  /** Global budget shared by every task (default: `limits.concurrencyBudget`). */
  budget?: ConcurrencyBudget;
  graph?: PipelineGraph;
  /** Must be built over the same graph. */
  store?: TaskStateStore;
  retry?: RetryPolicy;
  unitTimeoutMs?: number;
  assemblyTimeoutMs?: number;
  /** Replaces the backoff timer (for testing). */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  metrics?: PipelineMetrics;
};

export type CancelResult = {
  taskId: string;
  accepted: boolean;
  status: TaskStatus;
};

type ActiveTask = {
  /** Aborted on cancellation and on a required-stage failure. */
  halt: AbortController;
  budget: ConcurrencyBudget;
  terminal: Promise<void>;
  markTerminal: () => void;
  drained: Promise<void>;
  templateKind: string;
  submittedAt: number;
  /** Set once the task's outcome has been counted. */
  settled: boolean;
};

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Drives each submitted task through the pipeline graph: dispatches ready
 * stages concurrently, records their results and assembles the document once
 * every required stage is done.
 */
export class Orchestrator {
  readonly gateway: AgentGateway;
  readonly graph: PipelineGraph;
  readonly store: TaskStateStore;
  readonly budget: ConcurrencyBudget;
  private executor: StageExecutor;
  private meter: PipelineMetrics;
  private bus = new ProgressBus();
  private active = new Map<string, ActiveTask>();
  private assemblyTimeoutMs: number;
  private closed = false;

  constructor(opts: OrchestratorOptions) {
    const config = getConfig();
    this.gateway = opts.gateway;
    this.graph = opts.store?.graph ?? opts.graph ?? createDocumentPipeline();
    this.store = opts.store ?? new TaskStateStore({ graph: this.graph });
    this.budget =
      opts.budget ??
      new ConcurrencyBudget({
        limit: config.limits.concurrencyBudget,
        maxQueueSize: config.limits.maxQueuedUnits,
        name: "global",
      });
    this.assemblyTimeoutMs = opts.assemblyTimeoutMs ?? config.timeouts.assemblyMs;
    this.meter = opts.metrics ?? new PipelineMetrics();
    this.executor = new StageExecutor({
      gateway: this.gateway,
      budget: this.budget,
      retry: opts.retry,
      unitTimeoutMs: opts.unitTimeoutMs,
      sleep: opts.sleep,
      metrics: this.meter,
    });
  }

  /** Validate, create the task and start driving it. Returns the task id. */
  submit(topic: string, config?: Partial<TaskConfig>): string {
    const request = parseOrThrow(submitRequestSchema(), config === undefined ? { topic } : { topic, config }, "Invalid request");
    const defaults = getConfig().task;
    const overrides = request.config ?? {};
    const taskConfig: TaskConfig = {
      templateKind: overrides.templateKind ?? defaults.templateKind,
      maxSections: overrides.maxSections ?? defaults.maxSections,
      concurrency: overrides.concurrency ?? defaults.concurrency,
      includeImages: overrides.includeImages ?? defaults.includeImages,
      imageStyle: overrides.imageStyle ?? defaults.imageStyle,
    };
    const id = this.store.create({ topic: request.topic, config: taskConfig });

    let markTerminal = () => {};
    const terminal = new Promise<void>((resolve) => {
      markTerminal = resolve;
    });
    const active: ActiveTask = {
      halt: fanOutController(),
      budget: new ConcurrencyBudget({ limit: taskConfig.concurrency, name: `task:${id.slice(0, 8)}` }),
      terminal,
      markTerminal,
      drained: Promise.resolve(),
      templateKind: taskConfig.templateKind,
      submittedAt: Date.now(),
      settled: false,
    };
    this.active.set(id, active);
    this.meter.taskStarted();

    log.info("Task submitted", { taskId: id, topic: request.topic });
    active.drained = this.drive(id, active)
      .catch((err: unknown) => this.crash(id, err))
      .finally(() => {
        this.settle(active, "failed");
        active.markTerminal();
        this.active.delete(id);
      });
    return id;
  }

  status(id: string): TaskSnapshot {
    return this.store.get(id);
  }

  list(limit?: number): TaskSnapshot[] {
    return this.store.list(limit);
  }

  /** Resolves with the task once it is completed or failed. */
  async wait(id: string): Promise<TaskSnapshot> {
    const task = this.store.get(id);
    if (isTerminal(task.status)) return task;
    const active = this.active.get(id);
    if (!active) {
      throw new OrchestratorError("INTERNAL", `Task "${id}" is not being driven by this orchestrator`);
    }
    await active.terminal;
    return this.store.get(id);
  }

  /**
   * Fail a running task at once. In-flight optional units are aborted;
   * required units run to completion and their results are discarded.
   */
  cancel(id: string): CancelResult {
    const task = this.store.get(id);
    const active = this.active.get(id);
    if (isTerminal(task.status) || !active) {
      return { taskId: id, accepted: false, status: task.status };
    }

    active.halt.abort();
    const snapshot = this.store.apply(id, { kind: "cancelled", error: new CancellationError() });
    log.info("Task cancelled", { taskId: id });
    this.settle(active, "failed");
    this.emitTerminal(snapshot);
    active.markTerminal();
    return { taskId: id, accepted: true, status: snapshot.status };
  }

  /** Tasks in flight, task durations and collaborator calls so far. */
  metrics(): MetricsSnapshot {
    return this.meter.snapshot();
  }

  subscribe(listener: ProgressListener): () => void {
    return this.bus.subscribe(listener);
  }

  /** Cancel every running task and wait for in-flight work to drain. */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const draining = [...this.active.entries()].map(([id, active]) => {
      this.cancel(id);
      return active.drained;
    });
    await Promise.all(draining);
    this.store.close();
  }

  // -------------------------------------------------------------------------
  // Driving
  // -------------------------------------------------------------------------

  private async drive(id: string, active: ActiveTask): Promise<void> {
    const inFlight = new Map<string, Promise<StageResult>>();

    while (!this.isTerminal(id)) {
      this.dispatch(id, active, inFlight);
      if (inFlight.size === 0) break;

      const result = await Promise.race(inFlight.values());
      inFlight.delete(result.stage);
      this.record(id, active, result);
    }

    if (inFlight.size > 0) {
      await Promise.all(inFlight.values());
      return;
    }
    if (this.isTerminal(id)) return;

    const task = this.store.get(id);
    const [unfinished] = this.graph.unfinishedRequired(this.store.statuses(task));
    if (unfinished) {
      const state = task.stages[unfinished.name];
      this.finish(
        this.store.apply(id, {
          kind: "failed",
          stage: unfinished.name,
          error: new FatalError("DEPENDENCY_FAILED", `Required stage "${unfinished.name}" was ${state?.status ?? "not run"}`),
        }),
      );
      return;
    }

    await this.assemble(id, active, task);
  }

  /** Skip blocked and disabled stages, then start every ready one. */
  private dispatch(id: string, active: ActiveTask, inFlight: Map<string, Promise<StageResult>>): void {
    let changed = true;
    while (changed) {
      changed = false;
      let task = this.store.get(id);

      for (const stage of this.graph.blockedStages(this.store.statuses(task))) {
        const dep = stage.dependsOn.find((d) => task.stages[d]?.status !== "done");
        task = this.store.apply(id, {
          kind: "stage-skipped",
          stage: stage.name,
          reason: `dependency "${dep ?? "?"}" did not complete`,
        });
        this.emitStage(task, stage.name);
        changed = true;
      }

      for (const stage of this.graph.readyStages(this.store.statuses(task))) {
        const ctx = this.contextOf(task);
        if (stage.enabled && !stage.enabled(ctx)) {
          task = this.store.apply(id, { kind: "stage-skipped", stage: stage.name, reason: "disabled" });
          this.emitStage(task, stage.name);
          changed = true;
          continue;
        }

        task = this.store.apply(id, { kind: "stage-started", stage: stage.name });
        this.emitStage(task, stage.name);
        inFlight.set(stage.name, this.runStage(stage, ctx, active));
      }
    }
  }

  private runStage(stage: StageDefinition, ctx: StageContext, active: ActiveTask): Promise<StageResult> {
    return this.executor
      .runStage(stage, ctx, { signal: active.halt.signal, taskBudget: active.budget })
      .catch((err: unknown): StageResult => ({
        stage: stage.name,
        status: "failed",
        error: new FatalError("INTERNAL", errorMessage(err), { cause: err }),
        units: [],
        durationMs: 0,
      }));
  }

  private record(id: string, active: ActiveTask, result: StageResult): void {
    if (this.isTerminal(id)) {
      log.debug(`Discarding result of stage "${result.stage}"`, { taskId: id, status: result.status });
      return;
    }

    const task = this.store.apply(id, { kind: "stage-result", result });
    this.emitStage(task, result.stage);
    if (task.status === "failed") {
      // Required stage failed: stop optional work still in flight.
      active.halt.abort();
      this.finish(task);
    }
  }

  private async assemble(id: string, active: ActiveTask, task: TaskSnapshot): Promise<void> {
    const { outline, contentBlocks, imageRefs } = task.outputs;
    if (!outline || !contentBlocks) {
      const error = new FatalError("DEPENDENCY_FAILED", "Outline or content blocks are missing");
      this.finish(this.store.apply(id, { kind: "failed", stage: "assemble", error }));
      return;
    }

    const result = await this.executor.invokeUnit(
      "assemble",
      {
        topic: task.topic,
        templateKind: task.config.templateKind,
        outline,
        contentBlocks,
        imageRefs: imageRefs ?? [],
      },
      {
        taskId: id,
        cancelSignal: active.halt.signal,
        taskBudget: active.budget,
        timeoutMs: this.assemblyTimeoutMs,
      },
    );

    if (this.isTerminal(id)) {
      log.debug("Discarding assembly result", { taskId: id });
      return;
    }
    if (result.status === "ok") {
      this.finish(this.store.apply(id, { kind: "completed", artifact: result.value }));
    } else {
      this.finish(this.store.apply(id, { kind: "failed", stage: "assemble", error: result.error }));
    }
  }

  /** Last resort for errors escaping the drive loop. */
  private crash(id: string, err: unknown): void {
    log.error("Task driver failed", { taskId: id, error: errorMessage(err) });
    try {
      if (this.isTerminal(id)) return;
      const error = err instanceof Error ? err : new Error(String(err));
      this.finish(this.store.apply(id, { kind: "failed", stage: "orchestrator", error }));
    } catch (recordErr) {
      log.error("Could not record task failure", { taskId: id, error: errorMessage(recordErr) });
    }
  }

  private finish(task: TaskSnapshot): void {
    if (task.status === "completed") {
      log.info("Task completed", { taskId: task.id, artifact: task.artifact?.uri });
    } else {
      log.warn("Task failed", { taskId: task.id, stage: task.error?.stage, code: task.error?.code });
    }
    this.emitTerminal(task);
    const active = this.active.get(task.id);
    if (active) {
      this.settle(active, task.status === "completed" ? "completed" : "failed");
      active.markTerminal();
    }
  }

  private settle(active: ActiveTask, outcome: TaskOutcome): void {
    if (active.settled) return;
    active.settled = true;
    this.meter.taskFinished(outcome, active.templateKind, Date.now() - active.submittedAt);
  }

  private isTerminal(id: string): boolean {
    return isTerminal(this.store.get(id).status);
  }

  private contextOf(task: TaskSnapshot): StageContext {
    return { taskId: task.id, topic: task.topic, config: task.config, outputs: task.outputs };
  }

  private emitStage(task: TaskSnapshot, stage: string): void {
    const state = task.stages[stage];
    if (!state) return;
    this.bus.emit({ kind: "stage", taskId: task.id, stage, status: state.status, progress: task.progress });
  }

  private emitTerminal(task: TaskSnapshot): void {
    this.bus.emit({ kind: "task", taskId: task.id, status: task.status, progress: task.progress, error: task.error });
  }
}
