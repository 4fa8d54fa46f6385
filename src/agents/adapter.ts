import type { AgentRole, RoleRequest } from "./roles.js";

/** Per-call context handed to a backend. */
export type InvocationContext = {
  taskId: string;
  /** 1-indexed attempt number of the unit being executed. */
  attempt: number;
  /** Aborted on timeout or cancellation; backends should stop work when it fires. */
  signal: AbortSignal;
};

/**
 * A concrete collaborator answering one role. Backends return the raw payload
 * or throw their native error; the gateway validates and classifies both.
 */
export interface AgentAdapter<R extends AgentRole = AgentRole> {
  readonly name: string;
  readonly type: "http" | "function" | string;
  readonly role: R;
  description?: string;

  invoke(request: RoleRequest<R>, ctx: InvocationContext): Promise<unknown>;
  healthCheck?(): Promise<boolean>;
}

