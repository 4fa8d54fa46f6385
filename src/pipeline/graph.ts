import { ConfigError } from "../errors.js";
import type { StageDefinition, StageStatus, StageStatusMap } from "./types.js";

const statusOf = (statuses: StageStatusMap, name: string): StageStatus => statuses[name] ?? "pending";

/**
 * Validate stage declarations: unique names, known dependencies, no
 * self-dependency, positive weights and no cycles.
 */
export function validateStages(stages: readonly StageDefinition[]): void {
  if (stages.length === 0) {
    throw new ConfigError("CONFIG_INVALID", "Pipeline has no stages");
  }

  const names = new Set<string>();
  for (const stage of stages) {
    if (names.has(stage.name)) {
      throw new ConfigError("CONFIG_INVALID", `Stage "${stage.name}" is declared twice`);
    }
    names.add(stage.name);
  }

  for (const stage of stages) {
    for (const dep of stage.dependsOn) {
      if (dep === stage.name) {
        throw new ConfigError("GRAPH_CYCLE", `Stage "${stage.name}" depends on itself`);
      }
      if (!names.has(dep)) {
        throw new ConfigError("UNKNOWN_DEPENDENCY", `Stage "${stage.name}" depends on unknown stage "${dep}"`);
      }
    }
    const weight = stage.weight ?? 1;
    if (!(weight > 0) || !Number.isFinite(weight)) {
      throw new ConfigError("CONFIG_INVALID", `Stage "${stage.name}" has invalid weight ${weight}`);
    }
  }

  const cycle = findCycle(stages);
  if (cycle) {
    throw new ConfigError("GRAPH_CYCLE", `Pipeline graph contains a cycle: ${cycle.join(" -> ")}`);
  }
}

/** DFS with coloring; returns the offending path when a back edge is found. */
function findCycle(stages: readonly StageDefinition[]): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  const deps = new Map<string, readonly string[]>();
  for (const stage of stages) {
    color.set(stage.name, WHITE);
    deps.set(stage.name, stage.dependsOn);
  }

  const path: string[] = [];

  function dfs(name: string): string[] | undefined {
    color.set(name, GRAY);
    path.push(name);
    for (const next of deps.get(name) ?? []) {
      const c = color.get(next);
      if (c === GRAY) return [...path.slice(path.indexOf(next)), next]; // back edge
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    path.pop();
    color.set(name, BLACK);
    return undefined;
  }

  for (const stage of stages) {
    if (color.get(stage.name) === WHITE) {
      const found = dfs(stage.name);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Immutable stage graph shared by every task of a pipeline. All queries are
 * pure functions of a task's stage statuses.
 */
export class PipelineGraph {
  readonly stages: readonly StageDefinition[];
  private byName: Map<string, StageDefinition>;
  private dependents = new Map<string, string[]>();

  constructor(stages: readonly StageDefinition[]) {
    validateStages(stages);
    this.stages = [...stages];
    this.byName = new Map(stages.map((s) => [s.name, s]));
    for (const stage of stages) {
      for (const dep of stage.dependsOn) {
        const list = this.dependents.get(dep) ?? [];
        list.push(stage.name);
        this.dependents.set(dep, list);
      }
    }
  }

  get(name: string): StageDefinition | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return this.stages.map((s) => s.name);
  }

  weightOf(name: string): number {
    return this.byName.get(name)?.weight ?? 1;
  }

  get totalWeight(): number {
    return this.stages.reduce((sum, s) => sum + (s.weight ?? 1), 0);
  }

  /** Pending stages whose dependencies are all done. */
  readyStages(statuses: StageStatusMap): StageDefinition[] {
    return this.stages.filter(
      (s) => statusOf(statuses, s.name) === "pending" && s.dependsOn.every((d) => statusOf(statuses, d) === "done"),
    );
  }

  /** Pending stages that can never start because a dependency failed or was skipped. */
  blockedStages(statuses: StageStatusMap): StageDefinition[] {
    return this.stages.filter(
      (s) =>
        statusOf(statuses, s.name) === "pending" &&
        s.dependsOn.some((d) => {
          const status = statusOf(statuses, d);
          return status === "failed" || status === "skipped";
        }),
    );
  }

  /** Every stage that transitively depends on `name`. */
  dependentsOf(name: string): string[] {
    const queue = [...(this.dependents.get(name) ?? [])];
    const visited = new Set<string>();
    const result: string[] = [];

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || visited.has(id)) continue;
      visited.add(id);
      result.push(id);
      queue.push(...(this.dependents.get(id) ?? []));
    }
    return result;
  }

  /** Stages in dependency order (dependencies first, declaration order otherwise). */
  topologicalOrder(): StageDefinition[] {
    const visited = new Set<string>();
    const sorted: StageDefinition[] = [];

    const visit = (stage: StageDefinition): void => {
      if (visited.has(stage.name)) return;
      visited.add(stage.name);
      for (const dep of stage.dependsOn) {
        const upstream = this.byName.get(dep);
        if (upstream) visit(upstream);
      }
      sorted.push(stage);
    };

    for (const stage of this.stages) visit(stage);
    return sorted;
  }

  /**
   * Fraction of stage weight that has settled: done, skipped, or failed on an
   * optional stage. A failed required stage never counts.
   */
  progress(statuses: StageStatusMap): number {
    const total = this.totalWeight;
    let settled = 0;
    for (const stage of this.stages) {
      const status = statusOf(statuses, stage.name);
      if (status === "done" || status === "skipped" || (status === "failed" && !stage.required)) {
        settled += stage.weight ?? 1;
      }
    }
    return total > 0 ? settled / total : 1;
  }

  /** True when no stage is pending or running. */
  isSettled(statuses: StageStatusMap): boolean {
    return this.stages.every((s) => {
      const status = statusOf(statuses, s.name);
      return status !== "pending" && status !== "running";
    });
  }

  /** Required stages that did not finish done. */
  unfinishedRequired(statuses: StageStatusMap): StageDefinition[] {
    return this.stages.filter((s) => s.required && statusOf(statuses, s.name) !== "done");
  }
}
