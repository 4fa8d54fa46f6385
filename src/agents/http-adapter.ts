import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import type { AgentAdapter, InvocationContext } from "./adapter.js";
import type { AgentRole, RoleRequest } from "./roles.js";

export type HttpAdapterOptions<R extends AgentRole> = {
  name: string;
  role: R;
  url: string;
  headers?: Record<string, string>;
  description?: string;
};

/** Non-2xx answer from an HTTP collaborator. */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly body: string;
  readonly retryAfterMs?: number;

  constructor(status: number, body: string, retryAfterMs?: number) {
    super(`HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

/** Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/** Serves a role by POSTing the request as JSON and reading a JSON answer. */
export class HttpAdapter<R extends AgentRole> implements AgentAdapter<R> {
  readonly name: string;
  readonly type = "http" as const;
  readonly role: R;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpAdapterOptions<R>) {
    this.name = opts.name;
    this.role = opts.role;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
  }

  async invoke(request: RoleRequest<R>, ctx: InvocationContext): Promise<unknown> {
    log.debug(`[${this.name}] POST ${this.url}`, { role: this.role, taskId: ctx.taskId, attempt: ctx.attempt });

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json", ...this.headers },
      body: JSON.stringify({ role: this.role, taskId: ctx.taskId, attempt: ctx.attempt, request }),
      signal: ctx.signal,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new HttpStatusError(res.status, body, parseRetryAfter(res.headers.get("retry-after")));
    }

    const text = await res.text();
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new SyntaxError(`[${this.name}] response is not JSON: ${String(err)}`, { cause: err });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(getConfig().timeouts.healthCheckMs),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }
}
