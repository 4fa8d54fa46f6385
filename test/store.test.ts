import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CancellationError, FatalError, OrchestratorError, TaskNotFoundError, TaskTerminalError } from "../src/errors.js";
import type { StageResult } from "../src/executor/types.js";
import { createDocumentPipeline } from "../src/pipeline/document-pipeline.js";
import type { PipelineOutputs, TaskConfig } from "../src/pipeline/types.js";
import { MemoryTaskPersistence, type TaskPersistence } from "../src/state/persistence.js";
import { SqliteTaskPersistence } from "../src/state/sqlite-persistence.js";
import { TaskStateStore } from "../src/state/store.js";
import { FINDINGS, outlineOf } from "./helpers.js";

const CONFIG: TaskConfig = {
  templateKind: "standard",
  maxSections: 10,
  concurrency: 2,
  includeImages: true,
  imageStyle: "abstract",
};

const done = (stage: string, output: Partial<PipelineOutputs> = {}): StageResult => ({
  stage,
  status: "done",
  output,
  units: [{ index: 0, status: "ok", attempts: 1, delaysMs: [], durationMs: 3 }],
  durationMs: 3,
});

const failed = (stage: string, error = new FatalError("UPSTREAM_REJECTED", "refused")): StageResult => ({
  stage,
  status: "failed",
  error,
  units: [],
  durationMs: 1,
});

const backends: Array<[string, () => TaskPersistence]> = [
  ["memory", () => new MemoryTaskPersistence()],
  ["sqlite", () => new SqliteTaskPersistence(":memory:")],
];

describe.each(backends)("TaskStateStore (%s)", (_name, makePersistence) => {
  function setup() {
    let now = 1_000;
    const persistence = makePersistence();
    const clock = () => now;
    const store = new TaskStateStore({ graph: createDocumentPipeline(), persistence, clock, owner: "host-a:100" });
    /** A later process opening the same records. */
    const reopen = (isOwnerAlive: (owner: string) => boolean) =>
      new TaskStateStore({ graph: createDocumentPipeline(), persistence, clock, owner: "host-a:200", isOwnerAlive });
    return { store, reopen, tick: (ms = 1_000) => (now += ms) };
  }

  /** Advance a task until write and image are both running. */
  function startFanOut(store: TaskStateStore, id: string): void {
    store.apply(id, { kind: "stage-started", stage: "research" });
    store.apply(id, { kind: "stage-result", result: done("research", { findings: FINDINGS }) });
    store.apply(id, { kind: "stage-started", stage: "structure" });
    store.apply(id, { kind: "stage-result", result: done("structure", { outline: outlineOf(2) }) });
    store.apply(id, { kind: "stage-started", stage: "write" });
    store.apply(id, { kind: "stage-started", stage: "image" });
  }

  it("creates a pending task with every stage pending", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    const task = store.get(id);

    expect(task).toMatchObject({ id, topic: "Tide pools", status: "pending", progress: 0, createdAt: 1_000 });
    expect(Object.keys(task.stages)).toEqual(["research", "structure", "write", "image"]);
    expect(task.stages.image).toEqual({ status: "pending", required: false, weight: 1, units: [] });
    expect(task.error).toBeUndefined();
    expect(task.artifact).toBeUndefined();
  });

  it("hands out frozen copies", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    const task = store.get(id);

    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task.stages.write)).toBe(true);
    expect(store.get(id)).not.toBe(task);
  });

  it("throws for unknown tasks", () => {
    const { store } = setup();
    expect(() => store.get("missing")).toThrow(TaskNotFoundError);
    expect(() => store.apply("missing", { kind: "stage-started", stage: "research" })).toThrow(TaskNotFoundError);
    expect(store.has("missing")).toBe(false);
  });

  it("starts the task with its first stage", () => {
    const { store, tick } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    tick();
    const task = store.apply(id, { kind: "stage-started", stage: "research" });

    expect(task.status).toBe("running");
    expect(task.startedAt).toBe(2_000);
    expect(task.stages.research).toMatchObject({ status: "running", startedAt: 2_000 });
    expect(() => store.apply(id, { kind: "stage-started", stage: "research" })).toThrow(
      'Stage "research" is already running',
    );
  });

  it("merges stage output and records unit telemetry", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    store.apply(id, { kind: "stage-started", stage: "research" });
    const task = store.apply(id, { kind: "stage-result", result: done("research", { findings: FINDINGS }) });

    expect(task.outputs.findings).toEqual(FINDINGS);
    expect(task.stages.research.status).toBe("done");
    expect(task.stages.research.units).toEqual([{ index: 0, status: "ok", attempts: 1, delaysMs: [], durationMs: 3 }]);
    expect(task.progress).toBe(0.25);
  });

  it("records an optional failure without failing the task", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    startFanOut(store, id);
    const task = store.apply(id, { kind: "stage-result", result: failed("image") });

    expect(task.status).toBe("running");
    expect(task.stages.image.error).toEqual({
      stage: "image",
      errorClass: "FatalError",
      code: "UPSTREAM_REJECTED",
      message: "refused",
    });
    expect(task.progress).toBe(0.75);
  });

  it("fails the task when a required stage fails", () => {
    const { store, tick } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    startFanOut(store, id);
    tick();
    const task = store.apply(id, {
      kind: "stage-result",
      result: failed("write", new FatalError("UPSTREAM_REJECTED", "section refused")),
    });

    expect(task.status).toBe("failed");
    expect(task.finishedAt).toBe(2_000);
    expect(task.error).toEqual({
      stage: "write",
      errorClass: "FatalError",
      code: "UPSTREAM_REJECTED",
      message: "section refused",
    });
    expect(task.stages.image).toMatchObject({ status: "failed", error: { code: "CANCELLED" } });
    expect(task.progress).toBe(0.5);
  });

  it("rejects updates to a terminal task", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    store.apply(id, { kind: "failed", stage: "research", error: new FatalError("INTERNAL", "boom") });

    expect(() => store.apply(id, { kind: "stage-started", stage: "research" })).toThrow(TaskTerminalError);
    expect(() => store.apply(id, { kind: "completed", artifact: { uri: "mem://doc" } })).toThrow(
      `Task "${id}" is already failed`,
    );
  });

  it("completes only once every required stage is done", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    startFanOut(store, id);

    expect(() => store.apply(id, { kind: "completed", artifact: { uri: "mem://doc" } })).toThrow(OrchestratorError);

    store.apply(id, { kind: "stage-result", result: done("write", { contentBlocks: [] }) });
    store.apply(id, { kind: "stage-result", result: failed("image") });
    const task = store.apply(id, { kind: "completed", artifact: { uri: "mem://doc", mediaType: "text/markdown" } });

    expect(task.status).toBe("completed");
    expect(task.artifact).toEqual({ uri: "mem://doc", mediaType: "text/markdown" });
    expect(task.progress).toBe(1);
    expect(task.error).toBeUndefined();
  });

  it("never lowers progress", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    const seen = [store.get(id).progress];
    const record = (p: number) => seen.push(p);

    record(store.apply(id, { kind: "stage-started", stage: "research" }).progress);
    record(store.apply(id, { kind: "stage-result", result: done("research", { findings: FINDINGS }) }).progress);
    record(store.apply(id, { kind: "stage-started", stage: "structure" }).progress);
    record(store.apply(id, { kind: "stage-result", result: done("structure", { outline: outlineOf(1) }) }).progress);
    record(store.apply(id, { kind: "stage-skipped", stage: "image", reason: "disabled" }).progress);
    record(store.apply(id, { kind: "stage-started", stage: "write" }).progress);
    record(store.apply(id, { kind: "stage-result", result: done("write", { contentBlocks: [] }) }).progress);
    record(store.apply(id, { kind: "completed", artifact: { uri: "mem://doc" } }).progress);

    expect(seen).toEqual([0, 0, 0.25, 0.25, 0.5, 0.75, 0.75, 1, 1]);
  });

  it("attributes a cancellation to the running stage", () => {
    const { store } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    store.apply(id, { kind: "stage-started", stage: "research" });
    const task = store.apply(id, { kind: "cancelled", error: new CancellationError() });

    expect(task.status).toBe("failed");
    expect(task.error).toEqual({
      stage: "research",
      errorClass: "CancellationError",
      code: "CANCELLED",
      message: "Task cancelled",
    });
    expect(task.stages.structure).toMatchObject({ status: "skipped", reason: 'task failed at "research"' });
    expect(task.progress).toBe(0);
  });

  it("lists newest first", () => {
    const { store, tick } = setup();
    const first = store.create({ topic: "first", config: CONFIG });
    tick();
    const second = store.create({ topic: "second", config: CONFIG });

    expect(store.list().map((t) => t.id)).toEqual([second, first]);
    expect(store.list(1).map((t) => t.id)).toEqual([second]);
  });

  it("fails tasks left unfinished by a previous process", () => {
    const { store, reopen, tick } = setup();
    const pending = store.create({ topic: "pending", config: CONFIG });
    tick();
    const running = store.create({ topic: "running", config: CONFIG });
    store.apply(running, { kind: "stage-started", stage: "research" });
    store.apply(running, { kind: "stage-result", result: done("research", { findings: FINDINGS }) });
    store.apply(running, { kind: "stage-started", stage: "structure" });
    tick();
    const finished = store.create({ topic: "finished", config: CONFIG });
    store.apply(finished, { kind: "failed", stage: "research", error: new FatalError("INTERNAL", "boom") });

    const next = reopen(() => false);
    expect(next.recoverInterrupted()).toEqual([running, pending]);
    expect(next.get(running).error).toEqual({
      stage: "structure",
      errorClass: "OrchestratorError",
      code: "INTERRUPTED",
      message: "Task was interrupted before it finished",
    });
    expect(next.get(pending).error?.stage).toBe("research");
    expect(next.get(finished).error?.code).toBe("INTERNAL");
    expect(next.recoverInterrupted()).toEqual([]);
  });

  it("leaves tasks of live owners and of itself alone", () => {
    const { store, reopen } = setup();
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    store.apply(id, { kind: "stage-started", stage: "research" });
    const owners: string[] = [];

    expect(store.recoverInterrupted()).toEqual([]);
    expect(
      reopen((owner) => {
        owners.push(owner);
        return true;
      }).recoverInterrupted(),
    ).toEqual([]);
    expect(owners).toEqual(["host-a:100"]);
    expect(store.get(id).status).toBe("running");
  });

  it("prunes only old terminal tasks", () => {
    const { store, tick } = setup();
    const old = store.create({ topic: "old", config: CONFIG });
    store.apply(old, { kind: "failed", stage: "research", error: new FatalError("INTERNAL", "boom") });
    tick();
    const active = store.create({ topic: "active", config: CONFIG });
    tick(10_000);

    expect(store.prune(5_000)).toBe(1);
    expect(store.has(old)).toBe(false);
    expect(store.has(active)).toBe(true);
  });
});

describe("TaskStateStore across processes", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "docpipe-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("recovers a task only once the process driving it is gone", () => {
    const dbPath = join(dir, "tasks.db");
    let firstAlive = true;
    const first = new SqliteTaskPersistence(dbPath);
    const second = new SqliteTaskPersistence(dbPath);
    const a = new TaskStateStore({ graph: createDocumentPipeline(), persistence: first, owner: "host-a:100" });
    const b = new TaskStateStore({
      graph: createDocumentPipeline(),
      persistence: second,
      owner: "host-a:200",
      isOwnerAlive: (owner) => firstAlive && owner === "host-a:100",
    });

    const id = a.create({ topic: "Tide pools", config: CONFIG });
    a.apply(id, { kind: "stage-started", stage: "research" });

    expect(b.recoverInterrupted()).toEqual([]);
    expect(a.get(id).status).toBe("running");
    expect(b.get(id).owner).toBe("host-a:100");

    firstAlive = false;
    expect(b.recoverInterrupted()).toEqual([id]);
    expect(a.get(id)).toMatchObject({ status: "failed", error: { stage: "research", code: "INTERRUPTED" } });
    a.close();
    b.close();
  });
});

describe("SqliteTaskPersistence", () => {
  it("round-trips a snapshot", () => {
    const persistence = new SqliteTaskPersistence(":memory:");
    const store = new TaskStateStore({ graph: createDocumentPipeline(), persistence, clock: () => 42 });
    const id = store.create({ topic: "Tide pools", config: CONFIG });
    store.apply(id, { kind: "stage-started", stage: "research" });
    const written = store.apply(id, { kind: "stage-result", result: done("research", { findings: FINDINGS }) });

    expect(persistence.load(id)).toEqual(written);
    expect(persistence.delete(id)).toBe(true);
    expect(persistence.load(id)).toBeUndefined();
    persistence.close();
  });
});
