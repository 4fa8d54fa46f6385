import { ValidationError } from "../errors.js";
import type { AgentGateway } from "./gateway.js";
import { HttpAdapter } from "./http-adapter.js";
import { AGENT_ROLES, isAgentRole, type AgentRole } from "./roles.js";

export type AgentEndpoint = {
  role: AgentRole;
  url: string;
};

/** Parse `role=url`, e.g. `write=http://127.0.0.1:8081/write`. */
export function parseAgentEndpoint(entry: string): AgentEndpoint {
  const eq = entry.indexOf("=");
  if (eq <= 0) {
    throw new ValidationError("VALIDATION_FAILED", `Expected role=url, got "${entry}"`);
  }
  const role = entry.slice(0, eq).trim();
  const url = entry.slice(eq + 1).trim();
  if (!isAgentRole(role)) {
    throw new ValidationError("VALIDATION_FAILED", `Unknown role "${role}" (expected one of ${AGENT_ROLES.join(", ")})`);
  }
  if (!URL.canParse(url)) {
    throw new ValidationError("VALIDATION_FAILED", `Invalid URL for role "${role}": ${url}`);
  }
  return { role, url };
}

/** Parse `Name: value` header flags. */
export function parseHeaders(entries: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of entries) {
    const colon = entry.indexOf(":");
    if (colon <= 0) {
      throw new ValidationError("VALIDATION_FAILED", `Expected "Name: value", got "${entry}"`);
    }
    headers[entry.slice(0, colon).trim()] = entry.slice(colon + 1).trim();
  }
  return headers;
}

/** Register one HttpAdapter per endpoint. */
export function registerHttpAgents(
  gateway: AgentGateway,
  endpoints: readonly AgentEndpoint[],
  headers: Record<string, string> = {},
): void {
  for (const { role, url } of endpoints) {
    gateway.register(new HttpAdapter({ name: `http:${role}`, role, url, headers }));
  }
}
