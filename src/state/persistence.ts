import type { TaskSnapshot } from "../pipeline/types.js";

export const TERMINAL_STATUSES = ["completed", "failed"] as const;

/**
 * Key-value contract for task records. Calls are synchronous so that a store
 * update and its write happen in one step.
 */
export interface TaskPersistence {
  save(task: TaskSnapshot): void;
  load(id: string): TaskSnapshot | undefined;
  /** Most recently created first; every task when `limit` is omitted. */
  list(limit?: number): TaskSnapshot[];
  delete(id: string): boolean;
  /** Delete terminal tasks last updated before `timestamp`. Returns the count removed. */
  deleteOlderThan(timestamp: number): number;
  close?(): void;
}

export class MemoryTaskPersistence implements TaskPersistence {
  private tasks = new Map<string, TaskSnapshot>();

  save(task: TaskSnapshot): void {
    this.tasks.set(task.id, structuredClone(task));
  }

  load(id: string): TaskSnapshot | undefined {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  list(limit?: number): TaskSnapshot[] {
    return [...this.tasks.values()]
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((task) => structuredClone(task));
  }

  delete(id: string): boolean {
    return this.tasks.delete(id);
  }

  deleteOlderThan(timestamp: number): number {
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (isTerminal(task.status) && task.updatedAt < timestamp) {
        this.tasks.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

export function isTerminal(status: TaskSnapshot["status"]): boolean {
  return status === "completed" || status === "failed";
}
