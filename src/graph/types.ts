export const TASK_KINDS = ["model-check", "proof-check", "test-harness"] as const;

/** Tagged variant selecting how a task's verification engine is invoked. */
export type TaskKind = (typeof TASK_KINDS)[number];

export type TaskDeclaration = {
  id: string;
  dependsOn: string[];
  kind?: TaskKind;
  /** Engine input: a model config, a proof module, a test target. Defaults to the id. */
  target?: string;
  /** Upper bound for this task's timeout in seconds, applied on top of the session timeout. */
  timeoutSeconds?: number;
};

/** Either `name → dependency names`, or an ordered declaration list. */
export type TaskDeclarations = Readonly<Record<string, readonly string[]>> | readonly TaskDeclaration[];

/** A validated, immutable graph node. `index` is its position in declaration order. */
export type TaskNode = {
  readonly index: number;
  readonly id: string;
  readonly kind: TaskKind;
  readonly target: string;
  readonly timeoutSeconds?: number;
  /** Indices of the tasks this one depends on. */
  readonly dependsOn: readonly number[];
};

export type TaskStatus = "pending" | "ready" | "running" | "succeeded" | "failed" | "timed_out";

export type TerminalStatus = Extract<TaskStatus, "succeeded" | "failed" | "timed_out">;

export type Outcome =
  | { status: "succeeded" }
  | { status: "failed"; code: number; reason?: string }
  | { status: "timed_out" };

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return status === "succeeded" || status === "failed" || status === "timed_out";
}
