export type ErrorCode =
  | "INVALID_OPTION"
  | "INVALID_FILE"
  | "UNKNOWN_TASK"
  | "DUPLICATE_TASK"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLE_DETECTED"
  | "AGGREGATION_INCONSISTENCY";

/** Base class for every error the orchestrator raises on purpose. */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

/** Invalid option values, unreadable files, unknown requested tasks. */
export class ConfigurationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ConfigurationError";
  }
}

export class UnknownDependencyError extends OrchestratorError {
  readonly taskId: string;
  readonly dependency: string;

  constructor(taskId: string, dependency: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${dependency}"`);
    this.name = "UnknownDependencyError";
    this.taskId = taskId;
    this.dependency = dependency;
  }
}

export class CycleDetectedError extends OrchestratorError {
  /** Task ids along the cycle; the first id is repeated at the end. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLE_DETECTED", `Dependency cycle detected: ${cycle.join(" -> ")}`);
    this.name = "CycleDetectedError";
    this.cycle = cycle;
  }
}

/** Scheduler bookkeeping went wrong. Never caused by a verifier result. */
export class AggregationInconsistencyError extends OrchestratorError {
  constructor(message: string) {
    super("AGGREGATION_INCONSISTENCY", message);
    this.name = "AggregationInconsistencyError";
  }
}

/** Structural or configuration faults detected before any task starts. */
export function isConfigurationFault(err: unknown): err is OrchestratorError {
  return (
    err instanceof ConfigurationError ||
    err instanceof UnknownDependencyError ||
    err instanceof CycleDetectedError
  );
}
