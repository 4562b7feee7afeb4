#!/usr/bin/env node

import { Command } from "commander";
import { fileURLToPath } from "node:url";
import { getConfig } from "./config.js";
import { isConfigurationFault } from "./errors.js";
import type { TaskGraph } from "./graph/task-graph.js";
import { loadConfigFile, loadTaskFile } from "./loader.js";
import { SessionStore } from "./persistence/store.js";
import { ConsoleReporter, JsonReporter } from "./reporters/console-reporter.js";
import { VerificationRunner } from "./runner.js";
import { parseOrThrow, RunCommandOptionsSchema } from "./schemas.js";
import { CONFIGURATION_ERROR_EXIT_CODE } from "./session/aggregator.js";
import { ALL_TASKS, type Target } from "./session/session.js";
import { log, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { reason: reason instanceof Error ? reason.message : String(reason) });
  process.exitCode = 1;
});

const DEFAULT_TASK_FILE = fileURLToPath(new URL("../config/tasks.json", import.meta.url));

const program = new Command();

program
  .name("verify-orchestrator")
  .description("Run verification tasks in dependency order with bounded parallelism")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

/** Run a command body and turn its result or error into the process exit code. */
async function exitWith(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (err) {
    console.error("Error:", err instanceof Error ? err.message : String(err));
    process.exitCode = isConfigurationFault(err) ? CONFIGURATION_ERROR_EXIT_CODE : 1;
  }
}

async function loadRunner(opts: { tasks?: string; config?: string }): Promise<VerificationRunner> {
  if (opts.config) await loadConfigFile(opts.config);
  return new VerificationRunner(await loadTaskFile(opts.tasks ?? DEFAULT_TASK_FILE));
}

/** `all` (or nothing) means every task, unless a task is literally named "all". */
function targetFor(graph: TaskGraph, task: string | undefined): Target {
  if (task === undefined || (task === "all" && !graph.has("all"))) return ALL_TASKS;
  return task;
}

// --- run ---
program
  .command("run")
  .description("Run a task and everything it depends on")
  .argument("[task]", 'Task to run, or "all"', "all")
  .option("-c, --concurrency <n>", "Max tasks running at once (default: available CPUs)")
  .option("-t, --timeout <seconds>", "Per-task timeout in seconds, 0 disables it")
  .option("--fail-fast", "Stop at the first failure or timeout")
  .option("-f, --tasks <file>", "Task declaration file")
  .option("--config <file>", "Runner configuration overrides (JSON)")
  .option("-o, --output <dir>", "Directory for the summary and logs")
  .option("--retries <n>", "Extra attempts when a verifier cannot be started")
  .option("--dry-run", "Print the plan without running anything")
  .option("--history", "Record the session in the history database")
  .option("--json", "Print the summary as JSON instead of text")
  .action(async (task: string, raw: unknown) => {
    await exitWith(async () => {
      const opts = parseOrThrow(RunCommandOptionsSchema, raw, "run options");
      if (opts.config) await loadConfigFile(opts.config);
      const declarations = await loadTaskFile(opts.tasks ?? DEFAULT_TASK_FILE);

      const runner = new VerificationRunner(declarations, {
        reporters: [opts.json ? new JsonReporter() : new ConsoleReporter()],
        store: opts.history && !opts.dryRun ? new SessionStore() : undefined,
      });
      const target = targetFor(runner.graph, task);

      if (opts.dryRun) {
        console.log(JSON.stringify(runner.plan(target), null, 2));
        return 0;
      }

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals): void => {
        log.warn(`Received ${signal}; stopping session`);
        controller.abort();
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);

      try {
        const result = await runner.run(target, {
          concurrency: opts.concurrency,
          timeoutSeconds: opts.timeout,
          failFast: opts.failFast,
          retries: opts.retries,
          outputDir: opts.output,
          abortSignal: controller.signal,
        });
        if (result.summaryPath) log.info(`Summary: ${result.summaryPath}`);
        return result.exitCode;
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        runner.shutdown();
      }
    });
  });

// --- plan ---
program
  .command("plan")
  .description("Print the resolved order and waves for a task (dry-run)")
  .argument("[task]", 'Task to plan, or "all"', "all")
  .option("-f, --tasks <file>", "Task declaration file")
  .option("--config <file>", "Runner configuration overrides (JSON)")
  .action(async (task: string, opts: { tasks?: string; config?: string }) => {
    await exitWith(async () => {
      const runner = await loadRunner(opts);
      console.log(JSON.stringify(runner.plan(targetFor(runner.graph, task)), null, 2));
      return 0;
    });
  });

// --- list ---
program
  .command("list")
  .description("List declared tasks with their kind and dependencies")
  .option("-f, --tasks <file>", "Task declaration file")
  .action(async (opts: { tasks?: string }) => {
    await exitWith(async () => {
      const { graph } = await loadRunner(opts);
      for (const id of graph.ids()) {
        const index = graph.indexOf(id);
        const deps = graph.dependencyIds(index);
        console.log(`${id} (${graph.node(index).kind})${deps.length > 0 ? ` <- ${deps.join(", ")}` : ""}`);
      }
      return 0;
    });
  });

// --- history ---
program
  .command("history")
  .description("List recorded sessions, newest first")
  .option("-n, --limit <n>", "How many sessions to show", "20")
  .option("--db <path>", "History database (default from configuration)")
  .option("--config <file>", "Runner configuration overrides (JSON)")
  .action(async (opts: { limit: string; db?: string; config?: string }) => {
    await exitWith(async () => {
      if (opts.config) await loadConfigFile(opts.config);
      const limit = Number(opts.limit);
      const store = new SessionStore(opts.db ?? getConfig().history.dbPath);
      try {
        const records = store.list(Number.isInteger(limit) && limit > 0 ? limit : 20);
        if (records.length === 0) {
          console.log("No sessions recorded.");
          return 0;
        }
        for (const r of records) {
          console.log(
            `${r.startedAt} ${r.sessionId} ${r.overallStatus.toUpperCase()} ` +
              `${r.succeeded} ok, ${r.failed} failed, ${r.timedOut} timed out ` +
              `in ${r.durationSeconds.toFixed(1)}s [${r.target.join(", ")}]`,
          );
        }
        return 0;
      } finally {
        store.close();
      }
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
