import type { Outcome } from "../graph/types.js";

/** What one executor invocation reports back to the scheduler. */
export type ExecutionRecord = {
  outcome: Outcome;
  startedAt: number;
  finishedAt: number;
  /** Exit status reported by the verifier, when it reported one. */
  exitCode?: number;
  logPath?: string;
  /** Human-readable detail for failures and timeouts. */
  reason?: string;
  /** The run was stopped by session cancellation rather than by its own result. */
  cancelled?: boolean;
  /** Verifier that handled the task. */
  verifier?: string;
};

export type TaskExecutorOptions = {
  /** How long to keep waiting for a verifier after aborting it (default: config). */
  graceMs?: number;
  /** Extra attempts when the verifier throws instead of returning a status (default: config). */
  retries?: number;
};
