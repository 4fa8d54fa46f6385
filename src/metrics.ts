import type { AgentRole } from "./agents/roles.js";

/** Upper bounds (ms) of the task duration histogram. */
export const TASK_DURATION_BUCKETS_MS = [
  1_000, 5_000, 10_000, 30_000, 60_000, 120_000, 300_000, 600_000, 1_800_000, 3_600_000,
] as const;

/** Upper bounds (ms) of the per-call duration histogram. */
export const CALL_DURATION_BUCKETS_MS = [100, 500, 1_000, 2_000, 5_000, 10_000, 30_000, 60_000] as const;

export type TaskOutcome = "completed" | "failed";
export type CallOutcome = "ok" | "error" | "cancelled";

export type DurationSummary = {
  count: number;
  totalMs: number;
  maxMs: number;
  /** Cumulative: each entry counts observations at or below `leMs`. */
  buckets: Array<{ leMs: number; count: number }>;
};

export type TaskMetric = { outcome: TaskOutcome; templateKind: string } & DurationSummary;
export type CallMetric = { role: AgentRole; outcome: CallOutcome } & DurationSummary;

export type MetricsSnapshot = {
  activeTasks: number;
  tasks: TaskMetric[];
  calls: CallMetric[];
};

type Series<L> = {
  labels: L;
  count: number;
  totalMs: number;
  maxMs: number;
  counts: number[];
};

class DurationHistogram<L extends Record<string, string>> {
  private series = new Map<string, Series<L>>();

  constructor(private bounds: readonly number[]) {}

  observe(labels: L, ms: number): void {
    const key = Object.values(labels).join("|");
    const series = this.series.get(key) ?? { labels, count: 0, totalMs: 0, maxMs: 0, counts: this.bounds.map(() => 0) };
    this.series.set(key, series);
    const value = Math.max(0, ms);
    series.count++;
    series.totalMs += value;
    series.maxMs = Math.max(series.maxMs, value);
    for (let i = 0; i < this.bounds.length; i++) {
      if (value <= this.bounds[i]) series.counts[i]++;
    }
  }

  /** Sorted by label values. */
  summaries(): Array<L & DurationSummary> {
    return [...this.series.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, s]) => ({
        ...s.labels,
        count: s.count,
        totalMs: s.totalMs,
        maxMs: s.maxMs,
        buckets: this.bounds.map((leMs, i) => ({ leMs, count: s.counts[i] })),
      }));
  }
}

/**
 * In-process counters for the orchestrator: tasks in flight, task durations
 * by outcome and template, collaborator calls by role and outcome.
 */
export class PipelineMetrics {
  private active = 0;
  private tasks = new DurationHistogram<{ outcome: TaskOutcome; templateKind: string }>(TASK_DURATION_BUCKETS_MS);
  private calls = new DurationHistogram<{ role: AgentRole; outcome: CallOutcome }>(CALL_DURATION_BUCKETS_MS);

  taskStarted(): void {
    this.active++;
  }

  taskFinished(outcome: TaskOutcome, templateKind: string, durationMs: number): void {
    this.active = Math.max(0, this.active - 1);
    this.tasks.observe({ outcome, templateKind }, durationMs);
  }

  /** One collaborator call; a timed-out call counts as an error. */
  recordCall(role: AgentRole, outcome: CallOutcome, durationMs: number): void {
    this.calls.observe({ role, outcome }, durationMs);
  }

  snapshot(): MetricsSnapshot {
    return { activeTasks: this.active, tasks: this.tasks.summaries(), calls: this.calls.summaries() };
  }
}

function average(summary: DurationSummary): number {
  return summary.count === 0 ? 0 : Math.round(summary.totalMs / summary.count);
}

/** One line per series, for terminal output. */
export function formatMetrics(snapshot: MetricsSnapshot): string[] {
  const lines = [`active tasks: ${snapshot.activeTasks}`];
  for (const t of snapshot.tasks) {
    lines.push(`task ${t.templateKind} ${t.outcome}: count=${t.count} avg=${average(t)}ms max=${t.maxMs}ms`);
  }
  for (const c of snapshot.calls) {
    lines.push(`call ${c.role} ${c.outcome}: count=${c.count} avg=${average(c)}ms max=${c.maxMs}ms`);
  }
  return lines;
}
