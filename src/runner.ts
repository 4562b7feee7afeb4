import { join } from "node:path";
import { getConfig } from "./config.js";
import { TaskExecutor } from "./executor/executor.js";
import { DependencyResolver } from "./graph/resolver.js";
import { TaskGraph } from "./graph/task-graph.js";
import type { TaskDeclarations, TaskKind } from "./graph/types.js";
import type { SessionStore } from "./persistence/store.js";
import { summaryPath, writeSummary } from "./persistence/summary-file.js";
import type { Reporter } from "./reporters/reporter.js";
import { Scheduler, type SchedulerCallbacks } from "./scheduler/scheduler.js";
import { exitCodeFor, INTERRUPTED_EXIT_CODE, summarize, type SessionSummary } from "./session/aggregator.js";
import { ALL_TASKS, createSession, requestedIds, type Target } from "./session/session.js";
import { log } from "./utils/logger.js";
import { ProcessVerifier } from "./verifiers/process-verifier.js";
import { VerifierRegistry } from "./verifiers/registry.js";
import type { Verifier } from "./verifiers/verifier.js";

export type RunOptions = {
  concurrency?: number;
  /** Per-task timeout in seconds; 0 disables it. */
  timeoutSeconds?: number;
  failFast?: boolean;
  /** Extra attempts for a verifier that throws before producing an exit code. */
  retries?: number;
  /** Directory for the summary file and process logs. */
  outputDir?: string;
  /** Write `<outputDir>/session-summary.json` (default: true). */
  writeSummary?: boolean;
  abortSignal?: AbortSignal;
};

export type RunResult = {
  summary: SessionSummary;
  exitCode: number;
  /** Where the summary was written, when it was. */
  summaryPath?: string;
};

export type PlannedTask = {
  id: string;
  kind: TaskKind;
  target: string;
  dependsOn: string[];
  timeoutSeconds?: number;
};

export type Plan = {
  target: string[];
  /** Requested tasks and their dependencies, in run order. */
  order: string[];
  /** The same tasks grouped into waves that could run together. */
  levels: string[][];
  tasks: PlannedTask[];
};

export type VerificationRunnerOptions = {
  reporters?: Reporter[];
  /** Records every finished session when given. */
  store?: SessionStore;
};

/**
 * Entry point for embedding: owns the task graph and the verifier registry,
 * and turns one target into one finished session.
 */
export class VerificationRunner {
  readonly graph: TaskGraph;
  readonly verifiers = new VerifierRegistry();
  private reporters: Reporter[];
  private store?: SessionStore;

  constructor(declarations: TaskDeclarations, opts: VerificationRunnerOptions = {}) {
    this.graph = TaskGraph.build(declarations);
    this.reporters = opts.reporters ?? [];
    this.store = opts.store;
  }

  addVerifier(verifier: Verifier): void {
    this.verifiers.add(verifier);
  }

  addReporter(reporter: Reporter): void {
    this.reporters.push(reporter);
  }

  /** Resolve a target without running anything. */
  plan(target: Target = ALL_TASKS): Plan {
    const names = requestedIds(this.graph, target);
    const closure = this.graph.transitiveClosure(names);
    const resolver = new DependencyResolver(this.graph);
    const idOf = (index: number): string => this.graph.node(index).id;
    const order = resolver.order(closure);

    return {
      target: [...new Set(names.map((n) => this.graph.indexOf(n)))].sort((a, b) => a - b).map(idOf),
      order: order.map(idOf),
      levels: resolver.levels(closure).map((wave) => wave.map(idOf)),
      tasks: order.map((index) => {
        const node = this.graph.node(index);
        return {
          id: node.id,
          kind: node.kind,
          target: node.target,
          dependsOn: this.graph.dependencyIds(index),
          timeoutSeconds: node.timeoutSeconds,
        };
      }),
    };
  }

  /** Run a target to completion, then persist and report its summary. */
  async run(target: Target = ALL_TASKS, opts: RunOptions = {}, callbacks: SchedulerCallbacks = {}): Promise<RunResult> {
    const config = getConfig();
    const session = createSession(this.graph, target, {
      concurrency: opts.concurrency ?? config.limits.maxConcurrency,
      timeoutSeconds: opts.timeoutSeconds ?? config.timeouts.taskDefaultSeconds,
      failFast: opts.failFast ?? false,
    });

    if (this.verifiers.list().length === 0) {
      const logDir = opts.outputDir ? join(opts.outputDir, config.output.logsDir) : undefined;
      log.debug("No verifiers registered; using the process verifier");
      this.verifiers.add(new ProcessVerifier({ logDir }));
    }

    const executor = new TaskExecutor(this.verifiers, { retries: opts.retries });
    await new Scheduler(executor).execute(session, { ...callbacks, abortSignal: opts.abortSignal });

    const summary = summarize(session);
    const result: RunResult = {
      summary,
      exitCode: summary.interrupted ? INTERRUPTED_EXIT_CODE : exitCodeFor(summary.overallStatus),
    };

    if (opts.writeSummary ?? true) {
      result.summaryPath = await writeSummary(summary, summaryPath(opts.outputDir));
    }
    this.store?.insert(summary);

    for (const reporter of this.reporters) await reporter.report(summary);

    log.info(`Session ${summary.sessionId}: ${summary.overallStatus}`, {
      exitCode: result.exitCode,
      counts: summary.counts,
    });
    return result;
  }

  shutdown(): void {
    this.store?.close();
  }
}
