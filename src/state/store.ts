import { randomUUID } from "node:crypto";
import type { ArtifactHandle } from "../agents/roles.js";
import { OrchestratorError, TaskNotFoundError, TaskTerminalError } from "../errors.js";
import type { StageResult } from "../executor/types.js";
import type { PipelineGraph } from "../pipeline/graph.js";
import type { StageStatusMap, TaskConfig, TaskError, TaskSnapshot } from "../pipeline/types.js";
import { log } from "../utils/logger.js";
import { isOwnerAlive, processOwner } from "./owner.js";
import { MemoryTaskPersistence, isTerminal, type TaskPersistence } from "./persistence.js";

export type TaskUpdate =
  | { kind: "stage-started"; stage: string }
  | { kind: "stage-result"; result: StageResult }
  | { kind: "stage-skipped"; stage: string; reason: string }
  | { kind: "completed"; artifact: ArtifactHandle }
  | { kind: "failed"; stage: string; error: Error }
  | { kind: "cancelled"; error: Error };

export type NewTask = {
  topic: string;
  config: TaskConfig;
};

export type TaskStateStoreOptions = {
  graph: PipelineGraph;
  persistence?: TaskPersistence;
  clock?: () => number;
  /** Stamped on every task this store creates (default: `host:pid`). */
  owner?: string;
  /** Decides whether another owner may still be driving its tasks. */
  isOwnerAlive?: (owner: string) => boolean;
};

const storeLog = log.child("store");

/** Stage-attributed error as recorded on a task. */
export function toTaskError(stage: string, err: Error): TaskError {
  return {
    stage,
    errorClass: err.name,
    code: err instanceof OrchestratorError ? err.code : "INTERNAL",
    message: err.message,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Sole writer of task records. Every mutation goes through `apply`, which is
 * synchronous and therefore atomic for a task id.
 */
export class TaskStateStore {
  readonly graph: PipelineGraph;
  private persistence: TaskPersistence;
  private clock: () => number;
  readonly owner: string;
  private isOwnerAlive: (owner: string) => boolean;

  constructor(opts: TaskStateStoreOptions) {
    this.graph = opts.graph;
    this.persistence = opts.persistence ?? new MemoryTaskPersistence();
    this.clock = opts.clock ?? Date.now;
    this.owner = opts.owner ?? processOwner();
    this.isOwnerAlive = opts.isOwnerAlive ?? isOwnerAlive;
  }

  create(task: NewTask): string {
    const now = this.clock();
    const id = randomUUID();
    const stages: TaskSnapshot["stages"] = {};
    for (const stage of this.graph.stages) {
      stages[stage.name] = { status: "pending", required: stage.required, weight: stage.weight ?? 1, units: [] };
    }

    this.persistence.save({
      id,
      topic: task.topic,
      owner: this.owner,
      config: { ...task.config },
      status: "pending",
      progress: 0,
      stages,
      outputs: {},
      createdAt: now,
      updatedAt: now,
    });
    storeLog.debug("Task created", { taskId: id });
    return id;
  }

  /** Frozen copy of the task. */
  get(id: string): TaskSnapshot {
    return deepFreeze(this.load(id));
  }

  has(id: string): boolean {
    return this.persistence.load(id) !== undefined;
  }

  list(limit = 50): TaskSnapshot[] {
    return this.persistence.list(limit).map((task) => deepFreeze(task));
  }

  statuses(task: TaskSnapshot): StageStatusMap {
    return Object.fromEntries(Object.entries(task.stages).map(([name, state]) => [name, state.status]));
  }

  apply(id: string, update: TaskUpdate): TaskSnapshot {
    const task = this.load(id);
    if (isTerminal(task.status)) {
      throw new TaskTerminalError(id, task.status);
    }

    const now = this.clock();
    switch (update.kind) {
      case "stage-started": {
        const stage = this.stageOf(task, update.stage);
        if (stage.status !== "pending") {
          throw new OrchestratorError("INTERNAL", `Stage "${update.stage}" is already ${stage.status}`);
        }
        stage.status = "running";
        stage.startedAt = now;
        if (task.status === "pending") {
          task.status = "running";
          task.startedAt = now;
        }
        break;
      }

      case "stage-result": {
        const { result } = update;
        const stage = this.stageOf(task, result.stage);
        stage.finishedAt = now;
        stage.units = result.units;
        if (result.status === "done") {
          stage.status = "done";
          task.outputs = { ...task.outputs, ...result.output };
        } else {
          stage.status = "failed";
          stage.error = toTaskError(result.stage, result.error);
          if (stage.required) {
            this.fail(task, stage.error, now);
          }
        }
        break;
      }

      case "stage-skipped": {
        const stage = this.stageOf(task, update.stage);
        stage.status = "skipped";
        stage.reason = update.reason;
        stage.finishedAt = now;
        break;
      }

      case "completed": {
        const unfinished = this.graph.unfinishedRequired(this.statuses(task));
        if (unfinished.length > 0) {
          throw new OrchestratorError(
            "INTERNAL",
            `Cannot complete task "${id}": required stage "${unfinished[0].name}" is not done`,
          );
        }
        task.status = "completed";
        task.artifact = update.artifact;
        task.finishedAt = now;
        break;
      }

      case "failed":
        this.fail(task, toTaskError(update.stage, update.error), now);
        break;

      case "cancelled":
        this.fail(task, toTaskError(this.activeStage(task), update.error), now);
        break;
    }

    // A failed task keeps the progress it had reached.
    if (task.status !== "failed") {
      task.progress = Math.max(task.progress, this.graph.progress(this.statuses(task)));
    }
    task.updatedAt = now;
    this.persistence.save(task);
    return deepFreeze(task);
  }

  /**
   * Fail every task left pending or running by a process that is gone.
   * Tasks of this store and of live owners are left alone. Returns the ids
   * that were recovered.
   */
  recoverInterrupted(): string[] {
    const recovered: string[] = [];
    for (const task of this.persistence.list()) {
      if (isTerminal(task.status)) continue;
      if (task.owner === this.owner) continue;
      if (task.owner !== undefined && this.isOwnerAlive(task.owner)) continue;
      this.apply(task.id, {
        kind: "failed",
        stage: this.activeStage(task),
        error: new OrchestratorError("INTERRUPTED", "Task was interrupted before it finished"),
      });
      recovered.push(task.id);
    }
    if (recovered.length > 0) {
      storeLog.warn(`Recovered ${recovered.length} interrupted task(s)`);
    }
    return recovered;
  }

  /** Delete terminal tasks last updated before `before`. */
  prune(before: number): number {
    return this.persistence.deleteOlderThan(before);
  }

  close(): void {
    this.persistence.close?.();
  }

  private load(id: string): TaskSnapshot {
    const task = this.persistence.load(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  private stageOf(task: TaskSnapshot, name: string): TaskSnapshot["stages"][string] {
    const stage = task.stages[name];
    if (!stage) {
      throw new OrchestratorError("INTERNAL", `Task "${task.id}" has no stage "${name}"`);
    }
    return stage;
  }

  /** First running stage in dependency order, else the first pending one. */
  private activeStage(task: TaskSnapshot): string {
    const order = this.graph.topologicalOrder();
    const running = order.find((s) => task.stages[s.name]?.status === "running");
    const pending = order.find((s) => task.stages[s.name]?.status === "pending");
    return (running ?? pending ?? order[order.length - 1]).name;
  }

  /** Terminal failure; stages still in flight are abandoned, pending ones skipped. */
  private fail(task: TaskSnapshot, error: TaskError, now: number): void {
    task.status = "failed";
    task.error = error;
    task.finishedAt = now;

    for (const [name, stage] of Object.entries(task.stages)) {
      if (stage.status === "running") {
        stage.status = "failed";
        stage.finishedAt = now;
        stage.error = { stage: name, errorClass: "CancellationError", code: "CANCELLED", message: "Abandoned" };
      } else if (stage.status === "pending") {
        stage.status = "skipped";
        stage.reason = `task failed at "${error.stage}"`;
        stage.finishedAt = now;
      }
    }
  }
}
