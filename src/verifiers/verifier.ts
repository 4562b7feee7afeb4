import type { TaskKind } from "../graph/types.js";

/** What the runner hands a verifier alongside the task id and timeout. */
export type VerifierContext = {
  kind: TaskKind;
  target: string;
  /** Aborted when the task times out or the session is cancelled. */
  signal: AbortSignal;
};

export type VerifierResult = {
  /** Process-style exit status: 0 passes, anything else fails. */
  exitCode: number;
  durationSeconds: number;
  /** Where the engine's output was written. Never read by the runner. */
  logPath?: string;
};

/**
 * An external capability that runs one verification task. Implementations
 * should stop promptly once `context.signal` aborts; the executor stops
 * waiting for them after a grace period either way.
 */
export interface Verifier {
  name: string;
  type: "process" | "function" | string;
  /** Task kinds this verifier accepts. Empty or absent means any kind. */
  kinds?: TaskKind[];

  execute(taskId: string, timeoutSeconds: number, context: VerifierContext): Promise<VerifierResult>;
}
