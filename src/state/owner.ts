import { hostname } from "node:os";

/** `host:pid` of the process that drives a task. */
export function processOwner(): string {
  return `${hostname()}:${process.pid}`;
}

/**
 * Whether the process named by `owner` may still be driving its tasks. Only
 * owners on this host can be checked; any other owner counts as alive.
 */
export function isOwnerAlive(owner: string): boolean {
  const sep = owner.lastIndexOf(":");
  const host = owner.slice(0, sep);
  const pid = Number(owner.slice(sep + 1));
  if (sep <= 0 || host !== hostname() || !Number.isInteger(pid) || pid <= 0) return true;
  if (pid === process.pid) return true;

  try {
    // Signal 0 checks for the process without delivering anything.
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return typeof err === "object" && err !== null && "code" in err && err.code === "EPERM";
  }
}
