export type OrchestratorConfig = {
  timeouts: {
    /** Wall-clock limit for one unit attempt. */
    unitMs: number;
    /** Wall-clock limit for one assembly attempt. */
    assemblyMs: number;
    healthCheckMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    /** Global cap on in-flight units across every task. */
    concurrencyBudget: number;
    /** Units allowed to wait for a global slot before new waiters are rejected. */
    maxQueuedUnits: number;
    maxSectionsCeiling: number;
    maxConcurrencyPerTask: number;
    maxTopicLength: number;
  };
  task: {
    templateKind: string;
    maxSections: number;
    concurrency: number;
    includeImages: boolean;
    imageStyle: string;
  };
  persistence: {
    dbPath: string;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: OrchestratorConfig = {
  timeouts: {
    unitMs: 120_000,
    assemblyMs: 300_000,
    healthCheckMs: 5_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    concurrencyBudget: 4,
    maxQueuedUnits: 1_000,
    maxSectionsCeiling: 50,
    maxConcurrencyPerTask: 16,
    maxTopicLength: 500,
  },
  task: {
    templateKind: "standard",
    maxSections: 10,
    concurrency: 2,
    includeImages: true,
    imageStyle: "abstract",
  },
  persistence: {
    dbPath: "docpipe.db",
  },
};

let current: OrchestratorConfig = structuredClone(DEFAULTS);

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  const { timeouts, retry, limits, task, persistence } = DEFAULTS;
  current = {
    timeouts: { ...timeouts, ...overrides.timeouts },
    retry: { ...retry, ...overrides.retry },
    limits: { ...limits, ...overrides.limits },
    task: { ...task, ...overrides.task },
    persistence: { ...persistence, ...overrides.persistence },
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));
