// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { OrchestratorConfig } from "./config.js";

// Errors
export {
  OrchestratorError,
  ValidationError,
  ConfigError,
  TransientError,
  FatalError,
  CancellationError,
  TaskNotFoundError,
  TaskTerminalError,
  isUnitError,
} from "./errors.js";
export type { ErrorCode, UnitError } from "./errors.js";

// Schemas
export { parseOrThrow, formatIssues, submitRequestSchema, TaskSnapshotSchema } from "./schemas.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, CancelResult } from "./orchestrator.js";
export { ProgressBus } from "./progress.js";
export { PipelineMetrics, formatMetrics, TASK_DURATION_BUCKETS_MS, CALL_DURATION_BUCKETS_MS } from "./metrics.js";
export type { MetricsSnapshot, TaskMetric, CallMetric, CallOutcome, TaskOutcome, DurationSummary } from "./metrics.js";
export type { ProgressEvent, ProgressListener } from "./progress.js";

// Pipeline
export { PipelineGraph, validateStages } from "./pipeline/graph.js";
export { createDocumentPipeline, documentStages, STAGES } from "./pipeline/document-pipeline.js";
export { defineStage } from "./pipeline/types.js";
export type {
  StageDefinition,
  StageContext,
  StageState,
  StageStatus,
  TaskConfig,
  TaskError,
  TaskSnapshot,
  TaskStatus,
  PipelineOutputs,
  UnitTelemetry,
} from "./pipeline/types.js";

// Executor
export { StageExecutor } from "./executor/executor.js";
export type { StageExecutorOptions } from "./executor/executor.js";
export type { StageResult, UnitResult } from "./executor/types.js";

// State
export { TaskStateStore } from "./state/store.js";
export type { TaskUpdate, NewTask } from "./state/store.js";
export { MemoryTaskPersistence } from "./state/persistence.js";
export type { TaskPersistence } from "./state/persistence.js";
export { SqliteTaskPersistence } from "./state/sqlite-persistence.js";
export { processOwner, isOwnerAlive } from "./state/owner.js";

// Agents
export { AgentGateway } from "./agents/gateway.js";
export type { AgentHealth, GatewayOutcome } from "./agents/gateway.js";
export type { AgentAdapter, InvocationContext } from "./agents/adapter.js";
export { HttpAdapter, HttpStatusError } from "./agents/http-adapter.js";
export type { HttpAdapterOptions } from "./agents/http-adapter.js";
export { FunctionAdapter } from "./agents/function-adapter.js";
export type { AgentFunction, FunctionAdapterOptions } from "./agents/function-adapter.js";
export { classifyFailure } from "./agents/classify.js";
export { parseAgentEndpoint, registerHttpAgents } from "./agents/endpoints.js";
export { AGENT_ROLES } from "./agents/roles.js";
export type {
  AgentRole,
  RoleRequest,
  RoleResponse,
  Findings,
  Outline,
  ContentBlock,
  ImageRef,
  ArtifactHandle,
} from "./agents/roles.js";

// Utils
export { log, setLogLevel, setLogSink } from "./utils/logger.js";
export { retryPolicy, backoffDelay } from "./utils/retry.js";
export type { RetryPolicy } from "./utils/retry.js";
export { ConcurrencyBudget } from "./utils/concurrency-budget.js";
export type { ConcurrencyBudgetOptions } from "./utils/concurrency-budget.js";
