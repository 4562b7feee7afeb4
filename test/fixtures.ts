import type { SessionSummary, TaskSummary } from "../src/session/aggregator.js";

export function taskSummary(id: string, overrides: Partial<TaskSummary> = {}): TaskSummary {
  return {
    id,
    kind: "proof-check",
    status: "succeeded",
    requested: true,
    dependencies: [],
    durationSeconds: 1.2,
    exitCode: 0,
    propagated: false,
    cancelled: false,
    ...overrides,
  };
}

export function sessionSummary(overrides: Partial<SessionSummary> = {}): SessionSummary {
  const tasks = overrides.tasks ?? [
    taskSummary("Types", { requested: false }),
    taskSummary("Safety", { dependencies: ["Types"], status: "failed", exitCode: 1, reason: "Verifier exited with code 1" }),
  ];
  return {
    sessionId: "session-1",
    target: ["Safety"],
    overallStatus: "failure",
    interrupted: false,
    startedAt: "2026-03-01T10:00:00.000Z",
    finishedAt: "2026-03-01T10:00:02.500Z",
    durationSeconds: 2.5,
    concurrency: 2,
    peakConcurrency: 1,
    timeoutSeconds: 600,
    failFast: false,
    counts: { total: 2, succeeded: 1, failed: 1, timedOut: 0, propagated: 0, cancelled: 0 },
    tasks,
    ...overrides,
  };
}
