import { FatalError, TransientError, ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { AgentAdapter, InvocationContext } from "./adapter.js";
import { classifyFailure } from "./classify.js";
import { AGENT_ROLES, ROLE_RESPONSE_SCHEMAS, type AgentRole, type RoleRequest, type RoleResponse } from "./roles.js";

export type GatewayOutcome<T> =
  | { status: "ok"; value: T; durationMs: number }
  | { status: "error"; error: TransientError | FatalError; durationMs: number }
  | { status: "cancelled"; durationMs: number };

export type AgentHealth = {
  role: AgentRole;
  name: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

const gatewayLog = log.child("gateway");

/**
 * Uniform entry point to every collaborator. Resolves a role to its backend,
 * validates the payload and folds every failure into one outcome envelope.
 */
export class AgentGateway {
  /** Keyed by the role each adapter declares, so an entry always serves its key. */
  private backends = new Map<AgentRole, AgentAdapter>();
  private healthCache = new Map<AgentRole, AgentHealth>();

  register<R extends AgentRole>(adapter: AgentAdapter<R>): void {
    if (this.backends.has(adapter.role)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Role "${adapter.role}" already has a backend`);
    }
    this.backends.set(adapter.role, adapter);
    gatewayLog.debug(`Registered "${adapter.name}" for role "${adapter.role}"`, { type: adapter.type });
  }

  unregister(role: AgentRole): boolean {
    this.healthCache.delete(role);
    return this.backends.delete(role);
  }

  has(role: AgentRole): boolean {
    return this.backends.has(role);
  }

  get(role: AgentRole): AgentAdapter | undefined {
    return this.backends.get(role);
  }

  /** Roles that currently have a backend, in pipeline order. */
  roles(): AgentRole[] {
    return AGENT_ROLES.filter((role) => this.has(role));
  }

  /** Roles with no backend yet. */
  missingRoles(required: readonly AgentRole[] = AGENT_ROLES): AgentRole[] {
    return required.filter((role) => !this.has(role));
  }

  /** Invoke the backend for `role`. Never throws. */
  async invoke<R extends AgentRole>(
    role: R,
    request: RoleRequest<R>,
    ctx: InvocationContext,
  ): Promise<GatewayOutcome<RoleResponse<R>>> {
    const start = Date.now();
    const adapter = this.get(role);
    if (!adapter) {
      return {
        status: "error",
        error: new FatalError("ROLE_UNAVAILABLE", `No backend registered for role "${role}"`),
        durationMs: 0,
      };
    }

    try {
      const raw = await adapter.invoke(request, ctx);
      const value = ROLE_RESPONSE_SCHEMAS[role].parse(raw);
      return { status: "ok", value, durationMs: Date.now() - start };
    } catch (err) {
      const error = classifyFailure(err, role);
      const durationMs = Date.now() - start;
      if (error instanceof TransientError || error instanceof FatalError) {
        gatewayLog.warn(`${error.name} from "${adapter.name}"`, {
          role,
          taskId: ctx.taskId,
          attempt: ctx.attempt,
          code: error.code,
          error: String(err),
        });
        return { status: "error", error, durationMs };
      }
      return { status: "cancelled", durationMs };
    }
  }

  /** Check health of the backend serving `role`. */
  async checkHealth(role: AgentRole): Promise<AgentHealth> {
    const adapter = this.get(role);
    if (!adapter) {
      return { role, name: "(none)", healthy: false, lastCheck: Date.now(), error: "No backend registered" };
    }

    const start = Date.now();
    let result: AgentHealth;
    try {
      const healthy = adapter.healthCheck ? await adapter.healthCheck() : true;
      result = { role, name: adapter.name, healthy, lastCheck: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      result = {
        role,
        name: adapter.name,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: String(err),
      };
      gatewayLog.warn(`Health check failed for role "${role}"`, { error: String(err) });
    }
    this.healthCache.set(role, result);
    return result;
  }

  async checkAllHealth(): Promise<AgentHealth[]> {
    return Promise.all(this.roles().map((role) => this.checkHealth(role)));
  }

  getCachedHealth(role: AgentRole): AgentHealth | undefined {
    return this.healthCache.get(role);
  }
}
