import { randomUUID } from "node:crypto";
import { ConfigurationError } from "../errors.js";
import { DependencyResolver } from "../graph/resolver.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { Outcome, TaskStatus } from "../graph/types.js";
import { parseOrThrow, SessionOptionsSchema } from "../schemas.js";

/** Sentinel target meaning every declared task. */
export const ALL_TASKS: unique symbol = Symbol("all-tasks");

export type Target = typeof ALL_TASKS | string | readonly string[];

/** One row of the live status table. Written only by the scheduler. */
export type TaskState = {
  readonly index: number;
  readonly id: string;
  readonly requested: boolean;
  status: TaskStatus;
  startedAt?: number;
  finishedAt?: number;
  outcome?: Outcome;
  exitCode?: number;
  logPath?: string;
  reason?: string;
  verifier?: string;
  /** Failed because a dependency did not succeed; never ran. */
  propagated: boolean;
  /** Stopped or never started because the session was cancelled. */
  cancelled: boolean;
};

export type SessionOptions = {
  concurrency: number;
  /** Per-task timeout in seconds; 0 disables it. */
  timeoutSeconds: number;
  failFast?: boolean;
};

export type ExecutionSession = {
  readonly id: string;
  readonly graph: TaskGraph;
  /** Requested task ids, in declaration order. */
  readonly target: readonly string[];
  /** Requested tasks plus their transitive dependencies, in run order. */
  readonly order: readonly number[];
  readonly concurrency: number;
  readonly timeoutSeconds: number;
  readonly failFast: boolean;
  readonly tasks: ReadonlyMap<number, TaskState>;
  startedAt?: number;
  finishedAt?: number;
  /** Highest number of tasks observed running at once. */
  peakConcurrency: number;
  interrupted: boolean;
};

/** Requested task names for a target. Throws when the target names nothing. */
export function requestedIds(graph: TaskGraph, target: Target): string[] {
  const names = target === ALL_TASKS ? graph.ids() : typeof target === "string" ? [target] : [...target];
  if (names.length === 0) {
    throw new ConfigurationError("INVALID_OPTION", "No tasks requested");
  }
  return names;
}

/**
 * Validate options, resolve the target's closure and order, and lay out a
 * fresh status table with every task pending.
 */
export function createSession(graph: TaskGraph, target: Target, options: SessionOptions): ExecutionSession {
  const opts = parseOrThrow(SessionOptionsSchema, options, "session options");

  const names = requestedIds(graph, target);
  const closure = graph.transitiveClosure(names);
  const order = new DependencyResolver(graph).order(closure);
  const requested = new Set(names.map((n) => graph.indexOf(n)));

  const tasks = new Map<number, TaskState>();
  for (const index of order) {
    tasks.set(index, {
      index,
      id: graph.node(index).id,
      requested: requested.has(index),
      status: "pending",
      propagated: false,
      cancelled: false,
    });
  }

  return {
    id: randomUUID(),
    graph,
    target: [...requested].sort((a, b) => a - b).map((i) => graph.node(i).id),
    order,
    concurrency: opts.concurrency,
    timeoutSeconds: opts.timeoutSeconds,
    failFast: opts.failFast,
    tasks,
    peakConcurrency: 0,
    interrupted: false,
  };
}
