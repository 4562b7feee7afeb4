import type { z } from "zod";
import { AggregationInconsistencyError } from "../errors.js";
import { isTerminal } from "../graph/types.js";
import type { SessionSummarySchema, TaskSummarySchema } from "../schemas.js";
import type { ExecutionSession } from "./session.js";

export type OverallStatus = "success" | "failure" | "timeout";
export type TaskSummary = z.infer<typeof TaskSummarySchema>;
export type SessionSummary = z.infer<typeof SessionSummarySchema>;

const EXIT_CODES: Record<OverallStatus, number> = {
  success: 0,
  failure: 1,
  timeout: 2,
};

/** Exit status for faults raised before scheduling: unknown task, cycle, bad option. */
export const CONFIGURATION_ERROR_EXIT_CODE = 3;

/** Exit status for a session stopped by an external interrupt. */
export const INTERRUPTED_EXIT_CODE = 4;

/** Process exit status for an overall session status. */
export function exitCodeFor(status: OverallStatus): number {
  return EXIT_CODES[status];
}

/**
 * `success` when every requested task succeeded; otherwise `failure` when any
 * task ended `failed`, propagated and cancelled ones included, whatever
 * timeouts are present; otherwise `timeout`.
 */
export function overallStatus(tasks: readonly TaskSummary[]): OverallStatus {
  if (tasks.filter((t) => t.requested).every((t) => t.status === "succeeded")) return "success";
  if (tasks.some((t) => t.status === "failed")) return "failure";
  return tasks.some((t) => t.status === "timed_out") ? "timeout" : "failure";
}

/** Collapse a finished session into its serializable summary. Performs no formatting. */
export function summarize(session: ExecutionSession): SessionSummary {
  const { graph } = session;
  if (session.startedAt === undefined || session.finishedAt === undefined) {
    throw new AggregationInconsistencyError(`Session ${session.id} has not finished`);
  }

  const tasks = session.order.map((index): TaskSummary => {
    const state = session.tasks.get(index);
    if (!state) throw new AggregationInconsistencyError(`Task index ${index} missing from session ${session.id}`);
    const { status } = state;
    if (!isTerminal(status)) {
      throw new AggregationInconsistencyError(`Task "${state.id}" is still ${status}`);
    }
    const durationMs =
      state.startedAt !== undefined && state.finishedAt !== undefined ? state.finishedAt - state.startedAt : 0;
    return {
      id: state.id,
      kind: graph.node(index).kind,
      status,
      requested: state.requested,
      dependencies: graph.dependencyIds(index),
      durationSeconds: durationMs / 1000,
      exitCode: state.exitCode,
      logPath: state.logPath,
      reason: state.reason,
      propagated: state.propagated,
      cancelled: state.cancelled,
    };
  });

  const count = (pred: (t: TaskSummary) => boolean): number => tasks.filter(pred).length;

  return {
    sessionId: session.id,
    target: [...session.target],
    overallStatus: overallStatus(tasks),
    interrupted: session.interrupted,
    startedAt: new Date(session.startedAt).toISOString(),
    finishedAt: new Date(session.finishedAt).toISOString(),
    durationSeconds: (session.finishedAt - session.startedAt) / 1000,
    concurrency: session.concurrency,
    peakConcurrency: session.peakConcurrency,
    timeoutSeconds: session.timeoutSeconds,
    failFast: session.failFast,
    counts: {
      total: tasks.length,
      succeeded: count((t) => t.status === "succeeded"),
      failed: count((t) => t.status === "failed"),
      timedOut: count((t) => t.status === "timed_out"),
      propagated: count((t) => t.propagated),
      cancelled: count((t) => t.cancelled),
    },
    tasks,
  };
}
