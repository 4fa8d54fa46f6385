#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { parseAgentEndpoint, parseHeaders, registerHttpAgents } from "./agents/endpoints.js";
import { AgentGateway } from "./agents/gateway.js";
import { configure, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { formatMetrics } from "./metrics.js";
import { Orchestrator } from "./orchestrator.js";
import { createDocumentPipeline } from "./pipeline/document-pipeline.js";
import type { TaskSnapshot } from "./pipeline/types.js";
import { SqliteTaskPersistence } from "./state/sqlite-persistence.js";
import { TaskStateStore } from "./state/store.js";
import { ConcurrencyBudget } from "./utils/concurrency-budget.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

type GlobalOptions = { debug?: boolean; db?: string };
type AgentOptions = { agent?: string[]; header?: string[] };
type RunOptions = AgentOptions & {
  template?: string;
  maxSections?: number;
  concurrency?: number;
  images: boolean;
  imageStyle?: string;
  budget?: number;
  json?: boolean;
};

const DAY_MS = 24 * 60 * 60 * 1000;

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("docpipe")
  .description("Multi-stage document generation orchestrator")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--db <path>", "SQLite database for task records");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts: GlobalOptions = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
  if (opts.db) configure({ persistence: { dbPath: opts.db } });
});

function openStore(): TaskStateStore {
  return new TaskStateStore({
    graph: createDocumentPipeline(),
    persistence: new SqliteTaskPersistence(getConfig().persistence.dbPath),
  });
}

function buildGateway(opts: AgentOptions): AgentGateway {
  const gateway = new AgentGateway();
  registerHttpAgents(gateway, (opts.agent ?? []).map(parseAgentEndpoint), parseHeaders(opts.header ?? []));
  return gateway;
}

function printTask(task: TaskSnapshot): void {
  console.log(`${task.id}  [${task.status}] ${Math.round(task.progress * 100)}%  ${task.topic}`);
  for (const [name, stage] of Object.entries(task.stages)) {
    const attempts = stage.units.reduce((sum, u) => sum + u.attempts, 0);
    const detail = stage.error ? ` (${stage.error.code}: ${stage.error.message})` : stage.reason ? ` (${stage.reason})` : "";
    console.log(`    ${name.padEnd(10)} ${stage.status.padEnd(8)} units=${stage.units.length} attempts=${attempts}${detail}`);
  }
  if (task.artifact) console.log(`    artifact: ${task.artifact.uri}`);
  if (task.error) console.log(`    error: [${task.error.stage}] ${task.error.errorClass} ${task.error.code}: ${task.error.message}`);
}

// --- run ---
program
  .command("run")
  .description("Generate a document for a topic")
  .argument("<topic>", "Subject of the document")
  .option("-a, --agent <role=url...>", "HTTP collaborator per role (research, structure, write, image, assemble)")
  .option("-H, --header <header...>", "Extra request header for every collaborator (\"Name: value\")")
  .option("-t, --template <kind>", "Template kind")
  .option("-s, --max-sections <n>", "Maximum outline sections", positiveInt)
  .option("-c, --concurrency <n>", "Per-task concurrency", positiveInt)
  .option("--no-images", "Skip image generation")
  .option("--image-style <style>", "Image style")
  .option("-b, --budget <n>", "Global concurrency budget", positiveInt)
  .option("--json", "Print the final task as JSON")
  .action(async (topic: string, opts: RunOptions) => {
    const gateway = buildGateway(opts);

    const store = openStore();
    const recovered = store.recoverInterrupted();
    if (recovered.length > 0) console.error(`Marked ${recovered.length} interrupted task(s) as failed.`);

    const budget = opts.budget ? new ConcurrencyBudget({ limit: opts.budget, name: "global" }) : undefined;
    const orch = new Orchestrator({ gateway, store, budget });
    orch.subscribe((event) => {
      if (opts.json) return;
      const pct = `${Math.round(event.progress * 100)}%`.padStart(4);
      if (event.kind === "stage") console.error(`${pct}  ${event.stage}: ${event.status}`);
      else console.error(`${pct}  task ${event.status}`);
    });

    process.on("SIGINT", () => {
      console.error("Cancelling...");
      orch.shutdown().catch((err: unknown) => console.error("Shutdown failed:", errorMessage(err)));
    });

    try {
      const id = orch.submit(topic, {
        templateKind: opts.template,
        maxSections: opts.maxSections,
        concurrency: opts.concurrency,
        includeImages: opts.images,
        imageStyle: opts.imageStyle,
      });
      const task = await orch.wait(id);
      if (opts.json) console.log(JSON.stringify(task, null, 2));
      else printTask(task);
      for (const line of formatMetrics(orch.metrics())) console.error(`metrics: ${line}`);
      if (task.status !== "completed") process.exitCode = 1;
    } catch (err) {
      console.error("Run failed:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      await orch.shutdown();
    }
  });

// --- status ---
program
  .command("status")
  .description("Show one task")
  .argument("<id>", "Task id")
  .option("--json", "Print as JSON")
  .action((id: string, opts: { json?: boolean }) => {
    const store = openStore();
    try {
      const task = store.get(id);
      if (opts.json) console.log(JSON.stringify(task, null, 2));
      else printTask(task);
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store.close();
    }
  });

// --- tasks ---
program
  .command("tasks")
  .description("List recent tasks")
  .option("-l, --limit <n>", "Maximum tasks to list", positiveInt, 20)
  .action((opts: { limit: number }) => {
    const store = openStore();
    try {
      const tasks = store.list(opts.limit);
      if (tasks.length === 0) {
        console.log("No tasks.");
        return;
      }
      for (const task of tasks) {
        const when = new Date(task.createdAt).toISOString();
        console.log(`${task.id}  ${when}  ${task.status.padEnd(9)} ${Math.round(task.progress * 100)}%  ${task.topic}`);
      }
    } finally {
      store.close();
    }
  });

// --- prune ---
program
  .command("prune")
  .description("Delete finished tasks older than a number of days")
  .option("-d, --days <n>", "Age in days", positiveInt, 30)
  .action((opts: { days: number }) => {
    const store = openStore();
    try {
      const removed = store.prune(Date.now() - opts.days * DAY_MS);
      console.log(`Removed ${removed} task(s).`);
    } finally {
      store.close();
    }
  });

// --- roles ---
program
  .command("roles")
  .description("Check the health of configured collaborators")
  .option("-a, --agent <role=url...>", "HTTP collaborator per role")
  .option("-H, --header <header...>", "Extra request header (\"Name: value\")")
  .action(async (opts: AgentOptions) => {
    const gateway = buildGateway(opts);
    const missing = gateway.missingRoles();
    const results = await gateway.checkAllHealth();
    for (const r of results) {
      const icon = r.healthy ? "+" : "x";
      const latency = r.responseTimeMs !== undefined ? ` ${r.responseTimeMs}ms` : "";
      console.log(`[${icon}] ${r.role.padEnd(9)} ${r.name}${latency}${r.error ? ` (${r.error})` : ""}`);
    }
    for (const role of missing) console.log(`[ ] ${role.padEnd(9)} (not configured)`);
    if (missing.length > 0 || results.some((r) => !r.healthy)) process.exitCode = 1;
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
