import { CancellationError, OrchestratorError } from "../errors.js";
import { log } from "./logger.js";

export type ConcurrencyBudgetOptions = {
  /** Maximum slots held at once. */
  limit: number;
  /** Maximum waiters before acquire() rejects (default: unbounded). */
  maxQueueSize?: number;
  /** Name used in log lines. */
  name?: string;
};

/** Returns the slot. Calling it more than once is a no-op. */
export type Release = () => void;

type Waiter = {
  grant: (release: Release) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Counting semaphore with a FIFO wait queue. One instance is shared by every
 * task an orchestrator drives; per-task budgets are separate instances.
 */
export class ConcurrencyBudget {
  readonly limit: number;
  private readonly maxQueueSize: number;
  private readonly name: string;
  private held = 0;
  private queue: Waiter[] = [];
  private stats = { acquired: 0, queued: 0, rejected: 0, peakInFlight: 0 };

  constructor(opts: ConcurrencyBudgetOptions) {
    if (!Number.isInteger(opts.limit) || opts.limit < 1) {
      throw new OrchestratorError("CONFIG_INVALID", `Concurrency limit must be a positive integer, got ${opts.limit}`);
    }
    this.limit = opts.limit;
    this.maxQueueSize = opts.maxQueueSize ?? Number.POSITIVE_INFINITY;
    this.name = opts.name ?? "budget";
  }

  get inFlight(): number {
    return this.held;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /**
   * Wait for a slot. Rejects with CancellationError if `signal` aborts while
   * waiting; the waiter is removed from the queue.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(new CancellationError());

    const immediate = this.tryAcquire();
    if (immediate) return Promise.resolve(immediate);

    if (this.queue.length >= this.maxQueueSize) {
      this.stats.rejected++;
      return Promise.reject(new OrchestratorError("QUEUE_FULL", `Concurrency queue "${this.name}" is full`));
    }

    this.stats.queued++;
    log.debug("Waiting for concurrency slot", { budget: this.name, waiting: this.queue.length + 1 });

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(new CancellationError());
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  /** Take a slot without waiting. Returns undefined when none is free. */
  tryAcquire(): Release | undefined {
    if (this.held >= this.limit) return undefined;
    this.take();
    return this.releaser();
  }

  getStats(): { acquired: number; queued: number; rejected: number; peakInFlight: number; inFlight: number; waiting: number } {
    return { ...this.stats, inFlight: this.held, waiting: this.queue.length };
  }

  private take(): void {
    this.held++;
    this.stats.acquired++;
    this.stats.peakInFlight = Math.max(this.stats.peakInFlight, this.held);
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held--;
      this.dispatch();
    };
  }

  /** Hand freed slots to the oldest waiters. */
  private dispatch(): void {
    while (this.held < this.limit && this.queue.length > 0) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener("abort", waiter.onAbort);
      }
      this.take();
      waiter.grant(this.releaser());
    }
  }
}
