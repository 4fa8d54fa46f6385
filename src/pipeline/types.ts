import type { z } from "zod";
import type { AgentRole, RoleRequest, RoleResponse } from "../agents/roles.js";
import type {
  PipelineOutputsSchema,
  StageStateSchema,
  StageStatusSchema,
  TaskConfigSchema,
  TaskErrorSchema,
  TaskSnapshotSchema,
  TaskStatusSchema,
  UnitTelemetrySchema,
} from "../schemas.js";

export type TaskConfig = z.infer<typeof TaskConfigSchema>;
export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type StageStatus = z.infer<typeof StageStatusSchema>;
export type TaskError = z.infer<typeof TaskErrorSchema>;
export type UnitTelemetry = z.infer<typeof UnitTelemetrySchema>;
export type StageState = z.infer<typeof StageStateSchema>;
export type PipelineOutputs = z.infer<typeof PipelineOutputsSchema>;
export type TaskSnapshot = z.infer<typeof TaskSnapshotSchema>;

/** Stage name → status, as read from one task. Missing names count as pending. */
export type StageStatusMap = Readonly<Record<string, StageStatus>>;

/** What a stage sees of its task when planning and merging units. */
export type StageContext = {
  taskId: string;
  topic: string;
  config: TaskConfig;
  outputs: Readonly<PipelineOutputs>;
};

/** A successful unit handed to a stage's merge, in fan-out order. */
export type UnitSuccess<T> = {
  index: number;
  value: T;
};

/**
 * Static declaration of one pipeline stage. The same definition drives every
 * task; runtime status lives on the task.
 */
export interface StageDefinition<R extends AgentRole = AgentRole> {
  readonly name: string;
  readonly role: R;
  readonly dependsOn: readonly string[];
  /** Required failures fail the task; optional failures are recorded only. */
  readonly required: boolean;
  /** Share of task progress (default 1). */
  readonly weight?: number;

  /** A disabled stage is marked skipped instead of running. */
  enabled?(ctx: StageContext): boolean;
  /** One request per unit of work; an empty list completes the stage at once. */
  units(ctx: StageContext): Array<RoleRequest<R>>;
  /** Combine successful units into the stage's contribution to the task outputs. */
  merge(results: Array<UnitSuccess<RoleResponse<R>>>, ctx: StageContext): Partial<PipelineOutputs>;
}

/** Identity helper that keeps a stage's role-specific types while declaring it. */
export function defineStage<R extends AgentRole>(stage: StageDefinition<R>): StageDefinition<R> {
  return stage;
}
