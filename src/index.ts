// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { RunnerConfig, VerifierInvocation, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  ConfigurationError,
  UnknownDependencyError,
  CycleDetectedError,
  AggregationInconsistencyError,
  isConfigurationFault,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TaskDeclarationSchema,
  TaskListFileSchema,
  TaskMapFileSchema,
  SessionOptionsSchema,
  ConfigFileSchema,
  SessionSummarySchema,
  TaskSummarySchema,
} from "./schemas.js";
export { loadTaskFile, loadConfigFile } from "./loader.js";

// Graph
export { TaskGraph } from "./graph/task-graph.js";
export { DependencyResolver } from "./graph/resolver.js";
export { TASK_KINDS, isTerminal } from "./graph/types.js";
export type {
  TaskKind,
  TaskDeclaration,
  TaskDeclarations,
  TaskNode,
  TaskStatus,
  TerminalStatus,
  Outcome,
} from "./graph/types.js";

// Execution
export { TaskExecutor, effectiveTimeout, TIMEOUT_EXIT_CODE, NO_EXIT_CODE } from "./executor/executor.js";
export type { ExecutionRecord, TaskExecutorOptions } from "./executor/types.js";
export { Scheduler } from "./scheduler/scheduler.js";
export type { SchedulerCallbacks, SchedulerOptions } from "./scheduler/scheduler.js";
export { ALL_TASKS, createSession } from "./session/session.js";
export type { ExecutionSession, SessionOptions, Target, TaskState } from "./session/session.js";
export {
  summarize,
  overallStatus,
  exitCodeFor,
  CONFIGURATION_ERROR_EXIT_CODE,
  INTERRUPTED_EXIT_CODE,
} from "./session/aggregator.js";
export type { OverallStatus, SessionSummary, TaskSummary } from "./session/aggregator.js";

// Core
export { VerificationRunner } from "./runner.js";
export type { Plan, PlannedTask, RunOptions, RunResult, VerificationRunnerOptions } from "./runner.js";

// Verifiers
export type { Verifier, VerifierContext, VerifierResult } from "./verifiers/verifier.js";
export { VerifierRegistry } from "./verifiers/registry.js";
export { FunctionVerifier, VerifierAbortedError } from "./verifiers/function-verifier.js";
export type { VerifierFunction, FunctionVerifierOptions } from "./verifiers/function-verifier.js";
export { ProcessVerifier, expandInvocation, logFileName } from "./verifiers/process-verifier.js";
export type { ProcessVerifierOptions, ExpandedInvocation } from "./verifiers/process-verifier.js";

// Persistence
export { SessionStore } from "./persistence/store.js";
export type { SessionRecord } from "./persistence/store.js";
export { writeSummary, readSummary, summaryPath } from "./persistence/summary-file.js";

// Reporters
export type { Reporter, Writer } from "./reporters/reporter.js";
export { ConsoleReporter, JsonReporter, formatTaskLine } from "./reporters/console-reporter.js";

// Utils
export { log, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
