import { log } from "../utils/logger.js";
import type { AgentAdapter, InvocationContext } from "./adapter.js";
import type { AgentRole, RoleRequest, RoleResponse } from "./roles.js";

export type AgentFunction<R extends AgentRole> = (
  request: RoleRequest<R>,
  ctx: InvocationContext,
) => Promise<RoleResponse<R>>;

export type FunctionAdapterOptions<R extends AgentRole> = {
  name: string;
  role: R;
  fn: AgentFunction<R>;
  description?: string;
  healthCheck?: () => Promise<boolean>;
};

/** Serves a role with an in-process async function. */
export class FunctionAdapter<R extends AgentRole> implements AgentAdapter<R> {
  readonly name: string;
  readonly type = "function" as const;
  readonly role: R;
  readonly description?: string;

  private fn: AgentFunction<R>;
  private isHealthy?: () => Promise<boolean>;

  constructor(opts: FunctionAdapterOptions<R>) {
    this.name = opts.name;
    this.role = opts.role;
    this.fn = opts.fn;
    this.description = opts.description;
    this.isHealthy = opts.healthCheck;
  }

  async invoke(request: RoleRequest<R>, ctx: InvocationContext): Promise<RoleResponse<R>> {
    log.debug(`[${this.name}] Running ${this.role} function`, { taskId: ctx.taskId, attempt: ctx.attempt });
    return this.fn(request, ctx);
  }

  async healthCheck(): Promise<boolean> {
    return this.isHealthy ? this.isHealthy() : true;
  }
}
