import type { AgentFunction } from "../src/agents/function-adapter.js";
import { FunctionAdapter } from "../src/agents/function-adapter.js";
import { AgentGateway } from "../src/agents/gateway.js";
import type { AgentRole, Findings, Outline } from "../src/agents/roles.js";
import { retryPolicy, type RetryPolicy } from "../src/utils/retry.js";

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending promise callbacks run. */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) await new Promise<void>((r) => setImmediate(r));
}

export const FINDINGS: Findings = {
  topic: "Tide pools",
  items: [{ source: "field-notes", content: "Anemones close at low tide.", credibility: 0.9 }],
};

/** Outline with `count` sections, each carrying an image prompt. */
export function outlineOf(count: number): Outline {
  return {
    title: "Tide pools",
    sections: Array.from({ length: count }, (_, i) => ({
      id: `s${i + 1}`,
      title: `Section ${i + 1}`,
      imagePrompt: `picture ${i + 1}`,
    })),
  };
}

export type RoleFunctions = { [R in AgentRole]?: AgentFunction<R> };

const research: AgentFunction<"research"> = async (req) => ({ ...FINDINGS, topic: req.topic });
const structure: AgentFunction<"structure"> = async () => outlineOf(3);
const write: AgentFunction<"write"> = async (req) => ({
  sectionId: req.section.id,
  title: req.section.title,
  markdown: `## ${req.section.title}`,
});
const image: AgentFunction<"image"> = async (req) => ({ sectionId: req.sectionId, uri: `mem://img/${req.sectionId}` });
const assemble: AgentFunction<"assemble"> = async (req) => ({
  uri: `mem://doc/${req.contentBlocks.map((b) => b.sectionId).join("+")}`,
  mediaType: "text/markdown",
});

/** Gateway with an in-process backend for every role; pass functions to override. */
export function fakeGateway(overrides: RoleFunctions = {}): AgentGateway {
  const gateway = new AgentGateway();
  gateway.register(new FunctionAdapter({ name: "fake-research", role: "research", fn: overrides.research ?? research }));
  gateway.register(new FunctionAdapter({ name: "fake-structure", role: "structure", fn: overrides.structure ?? structure }));
  gateway.register(new FunctionAdapter({ name: "fake-write", role: "write", fn: overrides.write ?? write }));
  gateway.register(new FunctionAdapter({ name: "fake-image", role: "image", fn: overrides.image ?? image }));
  gateway.register(new FunctionAdapter({ name: "fake-assemble", role: "assemble", fn: overrides.assemble ?? assemble }));
  return gateway;
}

/** Retry policy with tiny delays. */
export function fastRetry(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return retryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 8, ...overrides });
}
