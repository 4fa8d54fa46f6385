import { ZodError } from "zod";
import { CancellationError, FatalError, OrchestratorError, TransientError, type UnitError } from "../errors.js";
import { HttpStatusError } from "./http-adapter.js";

const TRANSIENT_STATUS = new Set([408, 425, 429]);

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "EHOSTUNREACH",
]);

function readCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isNetworkFailure(err: unknown): boolean {
  for (let current: unknown = err, depth = 0; current && depth < 4; depth++) {
    const code = readCode(current);
    if (code && (NETWORK_CODES.has(code) || code.startsWith("UND_ERR_"))) return true;
    if (current instanceof TypeError && current.message === "fetch failed") return true;
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

/** Errors that carry their own `retryable: true` flag, optionally with `retryAfterMs`. */
function retryableHint(err: unknown): { retryAfterMs?: number } | undefined {
  if (typeof err !== "object" || err === null || !("retryable" in err) || err.retryable !== true) {
    return undefined;
  }
  const retryAfterMs = "retryAfterMs" in err && typeof err.retryAfterMs === "number" ? err.retryAfterMs : undefined;
  return { retryAfterMs };
}

/**
 * Sort a collaborator's native failure into the transient or fatal bucket.
 * This is the only place that knows what backend errors look like.
 */
export function classifyFailure(err: unknown, role: string): UnitError {
  if (err instanceof TransientError || err instanceof FatalError || err instanceof CancellationError) {
    return err;
  }
  if (err instanceof OrchestratorError) {
    return new FatalError(err.code, err.message, { cause: err });
  }

  if (err instanceof HttpStatusError) {
    if (err.status === 429) {
      return new TransientError("RATE_LIMITED", `${role} collaborator is rate limiting requests`, {
        cause: err,
        retryAfterMs: err.retryAfterMs,
      });
    }
    if (TRANSIENT_STATUS.has(err.status) || err.status >= 500) {
      return new TransientError("UPSTREAM_UNAVAILABLE", `${role} collaborator returned HTTP ${err.status}`, {
        cause: err,
        retryAfterMs: err.retryAfterMs,
      });
    }
    return new FatalError("UPSTREAM_REJECTED", `${role} collaborator rejected the request (HTTP ${err.status})`, {
      cause: err,
    });
  }

  if (err instanceof ZodError || err instanceof SyntaxError) {
    return new FatalError("MALFORMED_RESPONSE", `${role} collaborator returned a malformed response`, { cause: err });
  }

  if (err instanceof Error && err.name === "TimeoutError") {
    return new TransientError("TIMEOUT", `${role} collaborator timed out`, { cause: err });
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new CancellationError(`${role} call aborted`);
  }

  if (isNetworkFailure(err)) {
    return new TransientError("NETWORK", `${role} collaborator is unreachable`, { cause: err });
  }

  const hint = retryableHint(err);
  if (hint) {
    return new TransientError("UPSTREAM_UNAVAILABLE", `${role} collaborator reported a retryable failure`, {
      cause: err,
      retryAfterMs: hint.retryAfterMs,
    });
  }

  return new FatalError("UPSTREAM_REJECTED", `${role} collaborator failed`, { cause: err });
}
