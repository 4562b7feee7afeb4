import { getConfig } from "../config.js";
import type { Outcome, TaskNode } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { VerifierRegistry } from "../verifiers/registry.js";
import type { VerifierResult } from "../verifiers/verifier.js";
import type { ExecutionRecord, TaskExecutorOptions } from "./types.js";

/** Exit status `timeout(1)` uses when it kills its command. */
export const TIMEOUT_EXIT_CODE = 124;

/** Failure code recorded when the verifier produced no exit status. */
export const NO_EXIT_CODE = -1;

type AbortCause = "timeout" | "cancelled";

type Settled =
  | { type: "result"; result: VerifierResult }
  | { type: "error"; error: unknown }
  | { type: "abandoned" };

/** The tighter of two timeouts in seconds, where 0 or absent means none. */
export function effectiveTimeout(sessionSeconds: number, taskCapSeconds?: number): number {
  if (!taskCapSeconds) return sessionSeconds;
  if (!sessionSeconds) return taskCapSeconds;
  return Math.min(sessionSeconds, taskCapSeconds);
}

/**
 * Runs one task through its verifier under a timeout. Always resolves,
 * never rejects: every way a run can end is mapped onto an Outcome.
 */
export class TaskExecutor {
  private verifiers: VerifierRegistry;
  private opts: TaskExecutorOptions;

  constructor(verifiers: VerifierRegistry, opts: TaskExecutorOptions = {}) {
    this.verifiers = verifiers;
    this.opts = opts;
  }

  async run(task: TaskNode, timeoutSeconds: number, signal?: AbortSignal): Promise<ExecutionRecord> {
    const startedAt = Date.now();
    const config = getConfig();
    const graceMs = this.opts.graceMs ?? config.timeouts.graceMs;
    const retries = this.opts.retries ?? config.limits.retries;

    const verifier = this.verifiers.pick(task.kind);
    if (!verifier) {
      const reason = `No verifier registered for kind "${task.kind}"`;
      log.error(reason, { task: task.id });
      return { outcome: { status: "failed", code: NO_EXIT_CODE, reason }, startedAt, finishedAt: Date.now(), reason };
    }

    const controller = new AbortController();
    const state: { cause: AbortCause | null } = { cause: null };
    const cleanups: Array<() => void> = [];

    const abort = (cause: AbortCause): void => {
      if (state.cause !== null) return;
      state.cause = cause;
      controller.abort();
    };

    if (signal) {
      const onCancel = (): void => abort("cancelled");
      if (signal.aborted) onCancel();
      else {
        signal.addEventListener("abort", onCancel, { once: true });
        cleanups.push(() => signal.removeEventListener("abort", onCancel));
      }
    }

    if (timeoutSeconds > 0) {
      const deadline = setTimeout(() => abort("timeout"), timeoutSeconds * 1000);
      cleanups.push(() => clearTimeout(deadline));
    }

    log.debug(`Dispatching "${task.id}" to verifier "${verifier.name}"`, { timeoutSeconds });

    const invocation: Promise<Settled> = withRetry(
      () =>
        verifier.execute(task.id, timeoutSeconds, {
          kind: task.kind,
          target: task.target,
          signal: controller.signal,
        }),
      {
        maxAttempts: retries + 1,
        baseDelayMs: config.retry.baseDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
        shouldRetry: () => !controller.signal.aborted,
        label: `"${task.id}"`,
      },
    ).then(
      (result): Settled => ({ type: "result", result }),
      (error: unknown): Settled => ({ type: "error", error }),
    );

    // Once aborted, wait at most graceMs for the verifier to wind down.
    const abandoned = new Promise<Settled>((resolve) => {
      const startGrace = (): void => {
        const grace = setTimeout(() => resolve({ type: "abandoned" }), graceMs);
        cleanups.push(() => clearTimeout(grace));
      };
      if (controller.signal.aborted) return startGrace();
      controller.signal.addEventListener("abort", startGrace, { once: true });
      cleanups.push(() => controller.signal.removeEventListener("abort", startGrace));
    });

    const settled = await Promise.race([invocation, abandoned]);
    for (const cleanup of cleanups) cleanup();

    if (settled.type === "abandoned") {
      log.warn(`Verifier for "${task.id}" did not stop within ${graceMs}ms; releasing its slot`);
    }

    const record = classify(settled, state.cause, timeoutSeconds);
    return { ...record, startedAt, finishedAt: Date.now(), verifier: verifier.name };
  }
}

function classify(
  settled: Settled,
  cause: AbortCause | null,
  timeoutSeconds: number,
): Omit<ExecutionRecord, "startedAt" | "finishedAt"> {
  const result = settled.type === "result" ? settled.result : undefined;
  const detail = { exitCode: result?.exitCode, logPath: result?.logPath };

  if (cause === "timeout") {
    const reason = `Timed out after ${timeoutSeconds}s`;
    return { ...detail, outcome: { status: "timed_out" }, reason };
  }
  if (cause === "cancelled") {
    const reason = "cancelled";
    return { ...detail, outcome: failed(result?.exitCode ?? NO_EXIT_CODE, reason), reason, cancelled: true };
  }

  if (settled.type === "error") {
    const reason = settled.error instanceof Error ? settled.error.message : String(settled.error);
    return { outcome: failed(NO_EXIT_CODE, reason), reason };
  }
  if (settled.type === "abandoned") {
    // Only reachable after an abort, handled above.
    return { outcome: failed(NO_EXIT_CODE, "abandoned"), reason: "abandoned" };
  }

  const { exitCode } = settled.result;
  if (exitCode === 0) return { ...detail, outcome: { status: "succeeded" } };
  if (exitCode === TIMEOUT_EXIT_CODE) {
    const reason = `Verifier exited with ${TIMEOUT_EXIT_CODE} (timeout)`;
    return { ...detail, outcome: { status: "timed_out" }, reason };
  }
  const reason = `Verifier exited with code ${exitCode}`;
  return { ...detail, outcome: failed(exitCode, reason), reason };
}

function failed(code: number, reason: string): Outcome {
  return { status: "failed", code, reason };
}
