import { setMaxListeners } from "node:events";

/** Signal derived from other signals. `dispose` detaches it from its inputs. */
export type LinkedSignal = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * Controller whose signal has no listener cap: every unit of a fan-out
 * watches it at once.
 */
export function fanOutController(): AbortController {
  const controller = new AbortController();
  setMaxListeners(0, controller.signal);
  return controller;
}

/** Signal that aborts as soon as any of the given signals does. */
export function anySignal(signals: Array<AbortSignal | undefined>): LinkedSignal {
  const active = [...new Set(signals.filter((signal): signal is AbortSignal => Boolean(signal)))];
  if (active.length === 1) {
    return { signal: active[0], dispose: () => {} };
  }

  const controller = fanOutController();
  const dispose = () => {
    for (const signal of active) signal.removeEventListener("abort", abort);
  };
  const abort = () => {
    dispose();
    if (!controller.signal.aborted) controller.abort();
  };

  for (const signal of active) {
    if (signal.aborted) {
      abort();
      break;
    }
    signal.addEventListener("abort", abort, { once: true });
  }
  return { signal: controller.signal, dispose };
}

/** Resolves with `value` once `signal` aborts; never settles otherwise. */
export function whenAborted<T>(signal: AbortSignal, value: () => T): Promise<T> {
  return new Promise<T>((resolve) => {
    if (signal.aborted) {
      resolve(value());
      return;
    }
    signal.addEventListener("abort", () => resolve(value()), { once: true });
  });
}
