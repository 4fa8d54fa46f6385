import type { StageStatus, TaskError, TaskStatus } from "./pipeline/types.js";
import { errorMessage } from "./errors.js";
import { log } from "./utils/logger.js";

export type ProgressEvent =
  | { kind: "stage"; taskId: string; stage: string; status: StageStatus; progress: number }
  | { kind: "task"; taskId: string; status: TaskStatus; progress: number; error?: TaskError };

export type ProgressListener = (event: ProgressEvent) => void;

/** Fan-out of progress events. A throwing listener is logged and skipped. */
export class ProgressBus {
  private listeners = new Set<ProgressListener>();

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: ProgressListener): boolean {
    return this.listeners.delete(listener);
  }

  get size(): number {
    return this.listeners.size;
  }

  emit(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn("Progress listener threw", { taskId: event.taskId, error: errorMessage(err) });
      }
    }
  }
}
