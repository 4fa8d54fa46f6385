import { describe, expect, it } from "vitest";
import type { InvocationContext } from "../src/agents/adapter.js";
import { CancellationError, FatalError, TransientError } from "../src/errors.js";
import { StageExecutor } from "../src/executor/executor.js";
import { imageStage, writeStage } from "../src/pipeline/document-pipeline.js";
import type { StageContext } from "../src/pipeline/types.js";
import { ConcurrencyBudget } from "../src/utils/concurrency-budget.js";
import { FINDINGS, deferred, fakeGateway, fastRetry, flush, outlineOf, type RoleFunctions } from "./helpers.js";

function setup(overrides: RoleFunctions = {}, opts: { limit?: number; unitTimeoutMs?: number; maxAttempts?: number } = {}) {
  const slept: number[] = [];
  const budget = new ConcurrencyBudget({ limit: opts.limit ?? 4 });
  const executor = new StageExecutor({
    gateway: fakeGateway(overrides),
    budget,
    retry: fastRetry({ maxAttempts: opts.maxAttempts ?? 3 }),
    unitTimeoutMs: opts.unitTimeoutMs ?? 1_000,
    sleep: async (ms) => {
      slept.push(ms);
    },
  });
  return { executor, budget, slept };
}

function ctx(sections = 3): StageContext {
  return {
    taskId: "task-1",
    topic: "Tide pools",
    config: { templateKind: "standard", maxSections: 10, concurrency: 4, includeImages: true, imageStyle: "abstract" },
    outputs: { findings: FINDINGS, outline: outlineOf(sections) },
  };
}

const imageRequest = { sectionId: "s1", prompt: "waves", style: "abstract" };

/** Rejects like fetch does once the call's signal aborts. */
function untilAborted(c: InvocationContext): Promise<never> {
  return new Promise<never>((_, reject) => {
    c.signal.addEventListener("abort", () => {
      const err = new Error("This operation was aborted");
      err.name = "AbortError";
      reject(err);
    });
  });
}

describe("StageExecutor.invokeUnit", () => {
  it("returns the value with telemetry", async () => {
    const { executor } = setup();
    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1", index: 4 });

    expect(result.status).toBe("ok");
    if (result.status === "ok") expect(result.value.uri).toBe("mem://img/s1");
    expect(result.telemetry).toMatchObject({ index: 4, status: "ok", attempts: 1, delaysMs: [] });
  });

  it("retries transient failures with increasing backoff, then escalates", async () => {
    let calls = 0;
    const { executor, slept } = setup({
      image: async () => {
        calls++;
        throw new TransientError("UPSTREAM_UNAVAILABLE", "busy");
      },
    });

    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1" });

    expect(calls).toBe(3);
    expect(slept).toEqual([1, 2]);
    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error).toBeInstanceOf(TransientError);
    expect(result.telemetry).toMatchObject({
      status: "failed",
      attempts: 3,
      delaysMs: [1, 2],
      error: { errorClass: "TransientError", code: "UPSTREAM_UNAVAILABLE", message: "busy" },
    });
  });

  it("succeeds on a later attempt", async () => {
    let calls = 0;
    const { executor } = setup({
      image: async (req) => {
        calls++;
        if (calls === 1) throw new TransientError("NETWORK", "reset");
        return { sectionId: req.sectionId, uri: "mem://img/retry" };
      },
    });

    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1" });
    expect(result.status).toBe("ok");
    expect(result.telemetry).toMatchObject({ attempts: 2, delaysMs: [1] });
  });

  it("does not retry fatal failures", async () => {
    let calls = 0;
    const { executor, slept } = setup({
      image: async () => {
        calls++;
        throw new FatalError("UPSTREAM_REJECTED", "content policy");
      },
    });

    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1" });
    expect(calls).toBe(1);
    expect(slept).toEqual([]);
    expect(result.telemetry).toMatchObject({ status: "failed", attempts: 1 });
  });

  it("waits at least the collaborator's retry-after", async () => {
    let calls = 0;
    const { executor, slept } = setup({
      image: async (req) => {
        calls++;
        if (calls === 1) throw new TransientError("RATE_LIMITED", "slow down", { retryAfterMs: 5 });
        return { sectionId: req.sectionId, uri: "mem://img/s1" };
      },
    });

    await executor.invokeUnit("image", imageRequest, { taskId: "task-1" });
    expect(slept).toEqual([5]);
  });

  it("keeps backoff growing after a retry-after hint", async () => {
    let calls = 0;
    const { executor, slept } = setup({
      image: async (req) => {
        calls++;
        if (calls === 1) throw new TransientError("RATE_LIMITED", "slow down", { retryAfterMs: 5 });
        if (calls === 2) throw new TransientError("UPSTREAM_UNAVAILABLE", "busy");
        return { sectionId: req.sectionId, uri: "mem://img/s1" };
      },
    });

    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1" });
    expect(result.status).toBe("ok");
    expect(slept).toEqual([5, 8]);
  });

  it("turns a hung call into a timeout", async () => {
    const { executor } = setup({ image: () => new Promise(() => {}) }, { unitTimeoutMs: 20, maxAttempts: 1 });

    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1" });
    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.error).toBeInstanceOf(TransientError);
      expect(result.error.code).toBe("TIMEOUT");
      expect(result.error.message).toBe("image unit timed out after 20ms");
    }
  });

  it("takes a per-task slot as well as a global one", async () => {
    let running = 0;
    let peak = 0;
    const { executor } = setup({
      image: async (req) => {
        running++;
        peak = Math.max(peak, running);
        await flush(2);
        running--;
        return { sectionId: req.sectionId, uri: "mem://img" };
      },
    });
    const taskBudget = new ConcurrencyBudget({ limit: 1 });

    await Promise.all(
      [0, 1, 2].map((index) => executor.invokeUnit("image", imageRequest, { taskId: "task-1", index, taskBudget })),
    );
    expect(peak).toBe(1);
    expect(taskBudget.getStats().acquired).toBe(3);
  });

  it("stops before the first attempt when cancelled", async () => {
    let calls = 0;
    const { executor } = setup({
      image: async (req) => {
        calls++;
        return { sectionId: req.sectionId, uri: "mem://img" };
      },
    });

    const result = await executor.invokeUnit("image", imageRequest, { taskId: "task-1", cancelSignal: AbortSignal.abort() });
    expect(calls).toBe(0);
    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error).toBeInstanceOf(CancellationError);
    expect(result.telemetry.status).toBe("cancelled");
  });
});

describe("StageExecutor.runStage", () => {
  it("merges every unit of a stage", async () => {
    const { executor } = setup();
    const result = await executor.runStage(writeStage, ctx());

    expect(result.status).toBe("done");
    if (result.status === "done") {
      expect(result.output.contentBlocks?.map((b) => b.sectionId)).toEqual(["s1", "s2", "s3"]);
    }
    expect(result.units.map((u) => u.index).sort()).toEqual([0, 1, 2]);
  });

  it("never runs more units than the global budget allows", async () => {
    let running = 0;
    let peak = 0;
    const { executor } = setup(
      {
        write: async (req) => {
          running++;
          peak = Math.max(peak, running);
          await flush(3);
          running--;
          return { sectionId: req.section.id, title: req.section.title, markdown: "" };
        },
      },
      { limit: 2 },
    );

    const result = await executor.runStage(writeStage, ctx(5));
    expect(result.status).toBe("done");
    expect(peak).toBe(2);
  });

  it("fails a required stage on the first unit failure and aborts its siblings", async () => {
    const { executor } = setup({
      write: async (req, c) => {
        if (req.section.id === "s2") throw new FatalError("UPSTREAM_REJECTED", "section refused");
        return untilAborted(c);
      },
    });

    const result = await executor.runStage(writeStage, ctx());

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.error.code).toBe("UPSTREAM_REJECTED");
      expect(result.error.message).toBe("section refused");
    }
    const byIndex = [...result.units].sort((a, b) => a.index - b.index);
    expect(byIndex.map((u) => u.status)).toEqual(["cancelled", "failed", "cancelled"]);
  });

  it("drops failed units of an optional stage", async () => {
    const { executor } = setup({
      image: async (req) => {
        if (req.sectionId === "s2") throw new FatalError("UPSTREAM_REJECTED", "content policy");
        return { sectionId: req.sectionId, uri: `mem://img/${req.sectionId}` };
      },
    });

    const result = await executor.runStage(imageStage, ctx());

    expect(result.status).toBe("done");
    if (result.status === "done") {
      expect(result.output.imageRefs?.map((r) => r.sectionId)).toEqual(["s1", "s3"]);
    }
  });

  it("fails an optional stage when every unit fails", async () => {
    const { executor } = setup({
      image: async () => {
        throw new FatalError("UPSTREAM_REJECTED", "content policy");
      },
    });

    const result = await executor.runStage(imageStage, ctx());
    expect(result.status).toBe("failed");
    expect(result.units).toHaveLength(3);
  });

  it("completes a stage with no units at once", async () => {
    const { executor } = setup();
    const outline = { title: "t", sections: [{ id: "s1", title: "No picture" }] };
    const result = await executor.runStage(imageStage, { ...ctx(), outputs: { findings: FINDINGS, outline } });

    expect(result).toMatchObject({ status: "done", output: { imageRefs: [] }, units: [] });
  });

  it("fails the stage when planning its units throws", async () => {
    const { executor } = setup();
    const result = await executor.runStage(writeStage, { ...ctx(), outputs: {} });

    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error.code).toBe("DEPENDENCY_FAILED");
    expect(result.units).toEqual([]);
  });

  it("lets required units in flight finish when the task is cancelled", async () => {
    const gate = deferred();
    const sawAbort: boolean[] = [];
    const { executor } = setup({
      write: async (req, c) => {
        await gate.promise;
        sawAbort.push(c.signal.aborted);
        return { sectionId: req.section.id, title: req.section.title, markdown: "" };
      },
    });
    const controller = new AbortController();

    const pending = executor.runStage(writeStage, ctx(2), { signal: controller.signal });
    await flush();
    controller.abort();
    gate.resolve();
    const result = await pending;

    expect(sawAbort).toEqual([false, false]);
    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error).toBeInstanceOf(CancellationError);
  });

  it("aborts optional units in flight when the task is cancelled", async () => {
    const { executor } = setup({ image: (_req, c) => untilAborted(c) });
    const controller = new AbortController();

    const pending = executor.runStage(imageStage, ctx(), { signal: controller.signal });
    await flush();
    controller.abort();
    const result = await pending;

    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error).toBeInstanceOf(CancellationError);
    expect(result.units.map((u) => u.status)).toEqual(["cancelled", "cancelled", "cancelled"]);
  });

  it("fans out ten sections without an abort-listener leak warning", async () => {
    const warnings: string[] = [];
    const onWarning = (warning: Error) => warnings.push(warning.name);
    process.on("warning", onWarning);
    try {
      const { executor } = setup({}, { limit: 2 });
      const task = new AbortController();
      const [written, drawn] = await Promise.all([
        executor.runStage(writeStage, ctx(10), { signal: task.signal }),
        executor.runStage(imageStage, ctx(10), { signal: task.signal }),
      ]);
      await flush();

      expect(written.status).toBe("done");
      expect(drawn.status).toBe("done");
    } finally {
      process.off("warning", onWarning);
    }
    expect(warnings).toEqual([]);
  });

  it("reports each finished unit", async () => {
    const { executor } = setup();
    const seen: string[] = [];
    await executor.runStage(writeStage, ctx(2), { onUnitEnd: (stage, unit) => seen.push(`${stage}:${unit.index}`) });
    expect(seen.sort()).toEqual(["write:0", "write:1"]);
  });
});
