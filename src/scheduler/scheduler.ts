import { AggregationInconsistencyError } from "../errors.js";
import { effectiveTimeout, NO_EXIT_CODE, type TaskExecutor } from "../executor/executor.js";
import type { ExecutionRecord } from "../executor/types.js";
import { insertSorted } from "../graph/resolver.js";
import { isTerminal } from "../graph/types.js";
import type { ExecutionSession, TaskState } from "../session/session.js";
import { Channel } from "../utils/channel.js";
import { log } from "../utils/logger.js";

export type SchedulerCallbacks = {
  onTaskReady?: (taskId: string) => void;
  onTaskStart?: (taskId: string) => void;
  /** Fires exactly once per task, when it reaches a terminal status. */
  onTaskEnd?: (taskId: string, state: Readonly<TaskState>) => void;
};

export type SchedulerOptions = SchedulerCallbacks & {
  /** Aborting stops new launches, cancels running tasks and fails the rest. */
  abortSignal?: AbortSignal;
};

type Completion = { type: "completion"; index: number; record: ExecutionRecord };

/** Inbox messages: worker completions, and the external abort signal firing. */
type Message = Completion | { type: "interrupt" };

/**
 * Drives a session to completion with at most `session.concurrency` tasks in
 * flight. The loop is the only writer of the session's status table; workers
 * report back through a completion channel.
 */
export class Scheduler {
  private executor: TaskExecutor;

  constructor(executor: TaskExecutor) {
    this.executor = executor;
  }

  async execute(session: ExecutionSession, opts: SchedulerOptions = {}): Promise<ExecutionSession> {
    return new SessionLoop(session, this.executor, opts).run();
  }
}

class SessionLoop {
  /** Position of each task in the resolved order; the ready queue is sorted by it. */
  private position = new Map<number, number>();
  /** In-set dependencies not yet succeeded, per task. */
  private waitingOn = new Map<number, number>();
  /** Ready queue, as positions in the resolved order. */
  private ready: number[] = [];
  private inbox = new Channel<Message>();
  private cancel = new AbortController();
  private running = 0;
  private terminal = 0;
  private stopReason: string | null = null;

  constructor(
    private readonly session: ExecutionSession,
    private readonly executor: TaskExecutor,
    private readonly opts: SchedulerOptions,
  ) {}

  async run(): Promise<ExecutionSession> {
    const { session } = this;
    session.startedAt = Date.now();
    const total = session.tasks.size;
    log.info(`Session ${session.id}: ${total} task(s), concurrency ${session.concurrency}`, {
      target: session.target,
      timeoutSeconds: session.timeoutSeconds,
      failFast: session.failFast,
    });

    session.order.forEach((index, pos) => this.position.set(index, pos));
    for (const index of session.order) {
      const deps = session.graph.node(index).dependsOn.filter((d) => session.tasks.has(d));
      this.waitingOn.set(index, deps.length);
      if (deps.length === 0) this.markReady(index);
    }

    // The listener only posts to the inbox; the loop does the stopping.
    const { abortSignal } = this.opts;
    const onAbort = (): void => this.inbox.push({ type: "interrupt" });
    if (abortSignal?.aborted) this.interrupt();
    else abortSignal?.addEventListener("abort", onAbort, { once: true });

    try {
      while (this.terminal < total) {
        this.launchReady();

        if (this.running === 0) {
          throw new AggregationInconsistencyError(
            `Scheduler stalled with ${total - this.terminal} unfinished task(s) and nothing running`,
          );
        }

        const message = await this.inbox.next();
        if (message.type === "interrupt") {
          this.interrupt();
          continue;
        }
        this.running--;
        this.complete(message.index, message.record);
      }
    } finally {
      abortSignal?.removeEventListener("abort", onAbort);
      this.cancel.abort();
    }

    session.finishedAt = Date.now();
    log.info(`Session ${session.id} finished in ${session.finishedAt - session.startedAt}ms`);
    return session;
  }

  private state(index: number): TaskState {
    const state = this.session.tasks.get(index);
    if (!state) throw new AggregationInconsistencyError(`Task index ${index} is not part of session ${this.session.id}`);
    return state;
  }

  private markReady(index: number): void {
    const state = this.state(index);
    if (state.status !== "pending") {
      throw new AggregationInconsistencyError(`Task "${state.id}" became ready while ${state.status}`);
    }
    state.status = "ready";
    const pos = this.position.get(index);
    if (pos === undefined) throw new AggregationInconsistencyError(`Task "${state.id}" has no position`);
    insertSorted(this.ready, pos);
    this.opts.onTaskReady?.(state.id);
  }

  private launchReady(): void {
    while (this.stopReason === null && this.running < this.session.concurrency && this.ready.length > 0) {
      const pos = this.ready.shift();
      if (pos === undefined) break;
      this.launch(this.session.order[pos]);
    }
  }

  private launch(index: number): void {
    const { session } = this;
    const state = this.state(index);
    if (state.status !== "ready") {
      throw new AggregationInconsistencyError(`Task "${state.id}" launched while ${state.status}`);
    }

    const node = session.graph.node(index);
    const timeoutSeconds = effectiveTimeout(session.timeoutSeconds, node.timeoutSeconds);
    state.status = "running";
    state.startedAt = Date.now();
    this.running++;
    session.peakConcurrency = Math.max(session.peakConcurrency, this.running);
    log.info(`Starting "${state.id}"`, { timeoutSeconds, running: this.running });
    this.opts.onTaskStart?.(state.id);

    void this.executor.run(node, timeoutSeconds, this.cancel.signal).then(
      (record) => this.inbox.push({ type: "completion", index, record }),
      (err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        const now = Date.now();
        this.inbox.push({
          type: "completion",
          index,
          record: { outcome: { status: "failed", code: NO_EXIT_CODE, reason }, startedAt: now, finishedAt: now, reason },
        });
      },
    );
  }

  private complete(index: number, record: ExecutionRecord): void {
    const state = this.state(index);
    if (state.status !== "running") {
      throw new AggregationInconsistencyError(`Completion received for "${state.id}" while ${state.status}`);
    }

    state.outcome = record.outcome;
    state.exitCode = record.exitCode;
    state.logPath = record.logPath;
    state.reason = record.reason;
    state.verifier = record.verifier;
    state.cancelled = record.cancelled ?? false;
    this.finish(state, record.outcome.status, record.finishedAt);

    const durationMs = (state.finishedAt ?? record.finishedAt) - (state.startedAt ?? record.startedAt);
    if (record.outcome.status === "succeeded") {
      log.info(`"${state.id}" succeeded`, { durationMs });
      this.releaseDependents(index);
      return;
    }

    if (record.outcome.status === "timed_out") log.warn(`"${state.id}" timed out`, { durationMs });
    else log.error(`"${state.id}" failed`, { durationMs, exitCode: record.exitCode, reason: record.reason });

    this.cascade(index);
    if (this.session.failFast && !state.cancelled) this.stop("fail-fast");
  }

  private finish(state: TaskState, status: "succeeded" | "failed" | "timed_out", finishedAt: number): void {
    if (isTerminal(state.status)) {
      throw new AggregationInconsistencyError(`Task "${state.id}" reported terminal twice`);
    }
    state.status = status;
    state.finishedAt = finishedAt;
    this.terminal++;
    this.opts.onTaskEnd?.(state.id, state);
  }

  private releaseDependents(index: number): void {
    for (const dependent of this.session.graph.dependentsOf(index)) {
      const waiting = this.waitingOn.get(dependent);
      if (waiting === undefined) continue;
      this.waitingOn.set(dependent, waiting - 1);
      if (waiting === 1 && this.state(dependent).status === "pending") this.markReady(dependent);
    }
  }

  /** Fail every not-yet-run transitive dependent of `index` without running it. */
  private cascade(index: number): void {
    const origin = this.state(index);
    const queue: Array<{ index: number; cause: TaskState }> = this.session.graph
      .dependentsOf(index)
      .map((d) => ({ index: d, cause: origin }));

    for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
      const state = this.session.tasks.get(item.index);
      if (!state || state.status !== "pending") continue;

      const verb = item.cause.status === "timed_out" ? "timed out" : "failed";
      const reason = `dependency "${item.cause.id}" ${verb}`;
      state.outcome = { status: "failed", code: NO_EXIT_CODE, reason };
      state.reason = reason;
      state.propagated = true;
      log.warn(`"${state.id}" will not run: ${reason}`);
      this.finish(state, "failed", Date.now());

      for (const next of this.session.graph.dependentsOf(item.index)) queue.push({ index: next, cause: state });
    }
  }

  private interrupt(): void {
    this.session.interrupted = true;
    this.stop("interrupted");
  }

  /** Stop launching, cancel running work, and fail everything not yet started. */
  private stop(reason: string): void {
    if (this.stopReason !== null) return;
    this.stopReason = reason;
    log.warn(`Stopping session ${this.session.id} (${reason})`, { running: this.running });
    this.cancel.abort();

    this.ready = [];
    for (const index of this.session.order) {
      const state = this.state(index);
      if (state.status !== "pending" && state.status !== "ready") continue;
      const why = `cancelled (${reason})`;
      state.outcome = { status: "failed", code: NO_EXIT_CODE, reason: why };
      state.reason = why;
      state.cancelled = true;
      this.finish(state, "failed", Date.now());
    }
  }
}
